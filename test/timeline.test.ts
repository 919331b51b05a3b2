import test from "node:test";
import assert from "node:assert/strict";
import { MixEngine } from "../src/mix-engine";
import { buildFilterGraph, clipsForPlan, envelopeExpression, renderMixPlan } from "../src/timeline";
import { makeCatalog, makeTrack, testLibrary } from "./fixtures";

async function loopedPlan() {
  const engine = new MixEngine(makeCatalog([makeTrack("lift", "hopeful_uplifting", 120)]), testLibrary());
  return engine.plan({ contentType: "tips", targetDurationSec: 300 });
}

test("envelopeExpression renders flat and ramped spans", () => {
  const expr = envelopeExpression(
    [
      { timeSec: 0, gain: 0.2 },
      { timeSec: 1, gain: 0.2 },
      { timeSec: 1.5, gain: 0.05 }
    ],
    0
  );
  assert.equal(expr, "if(lt(t,1),0.2,if(lt(t,1.5),0.2+(-0.15)*(t-1)/0.5,0.05))");
});

test("envelopeExpression is relative to the clip origin", () => {
  const expr = envelopeExpression(
    [
      { timeSec: 10, gain: 0.2 },
      { timeSec: 12, gain: 0.05 }
    ],
    10
  );
  assert.equal(expr, "if(lt(t,2),0.2+(-0.15)*(t-0)/2,0.05)");
  assert.equal(envelopeExpression([], 0), "0");
  assert.equal(
    envelopeExpression(
      [
        { timeSec: 0, gain: 0.16 },
        { timeSec: 120, gain: 0.16 }
      ],
      0
    ),
    "0.16"
  );
});

test("clipsForPlan extends each repetition under the next one", async () => {
  const plan = await loopedPlan();
  const clips = clipsForPlan(plan);
  assert.deepEqual(clips.map((c) => c.startSec), [0, 117, 234]);
  assert.deepEqual(clips.map((c) => c.durationSec), [120, 120, 66]);
  assert.deepEqual(clips.map((c) => c.fadeInSec), [3, 3, 3]);
  assert.deepEqual(clips.map((c) => c.fadeOutSec), [3, 3, 4]);
  assert.deepEqual(clips.map((c) => c.gainExpr), ["0.16", "0.16", "0.16"]);
  assert.ok(clips.every((c) => c.filePath === "/music/hopeful_uplifting/lift.wav"));
});

test("buildFilterGraph trims, gains, fades and delays each clip", () => {
  const graph = buildFilterGraph(
    [{ filePath: "/music/a.wav", startSec: 0, durationSec: 60, gainExpr: "0.2", fadeInSec: 3, fadeOutSec: 4 }],
    { master: false }
  );
  assert.equal(
    graph,
    "[0:a]atrim=start=0:end=60,asetpts=PTS-STARTPTS,volume='0.2':eval=frame,afade=t=in:st=0:d=3:curve=tri,afade=t=out:st=56:d=4:curve=tri[c0];" +
      "[c0]adelay=0|0[d0];" +
      "[d0]amix=inputs=1:duration=longest:normalize=0[mix0];" +
      "[mix0]anull[out]"
  );
});

test("the last repetition of a loop always fades out", async () => {
  const engine = new MixEngine(makeCatalog([makeTrack("minute", "hopeful_uplifting", 60)]), testLibrary());
  const plan = await engine.plan({ contentType: "tips", targetDurationSec: 118 });
  const clips = clipsForPlan(plan);
  assert.deepEqual(clips.map((c) => c.durationSec), [60, 57, 7]);
  const lines = buildFilterGraph(clips, { master: false }).split(";");
  assert.equal(
    lines[4],
    "[2:a]atrim=start=0:end=7,asetpts=PTS-STARTPTS,volume='0.16':eval=frame,afade=t=in:st=0:d=3:curve=tri,afade=t=out:st=3:d=4:curve=tri[c2]"
  );
});

test("a fade-out longer than the clip is clamped to the clip", () => {
  const graph = buildFilterGraph(
    [{ filePath: "/music/a.wav", startSec: 0, durationSec: 3, gainExpr: "0.2", fadeOutSec: 4 }],
    { master: false }
  );
  assert.equal(
    graph.split(";")[0],
    "[0:a]atrim=start=0:end=3,asetpts=PTS-STARTPTS,volume='0.2':eval=frame,afade=t=out:st=0:d=3:curve=tri[c0]"
  );
});

test("buildFilterGraph mixes narration and masters the output", () => {
  const graph = buildFilterGraph(
    [
      { filePath: "/music/a.wav", startSec: 1.5, durationSec: 40, gainExpr: "0.1", curve: "log" },
      { filePath: "/voice.wav", startSec: 0, gainExpr: "1" }
    ],
    { masterLufs: -16 }
  );
  const lines = graph.split(";");
  assert.equal(lines[0], "[0:a]atrim=start=0:end=40,asetpts=PTS-STARTPTS,volume='0.1':eval=frame[c0]");
  assert.equal(lines[1], "[c0]adelay=1500|1500[d0]");
  assert.equal(lines[2], "[1:a]asetpts=PTS-STARTPTS,volume='1':eval=frame[c1]");
  assert.equal(lines[4], "[d0][d1]amix=inputs=2:duration=longest:normalize=0[mix0]");
  assert.equal(
    lines[5],
    "[mix0]loudnorm=I=-16:TP=-1.5:LRA=7,acompressor=threshold=-18dB:ratio=2.4:attack=20:release=180,alimiter=limit=0.89[out]"
  );
});

test("renderMixPlan rejects a plan without segments", async () => {
  const plan = await loopedPlan();
  await assert.rejects(renderMixPlan({ ...plan, entries: [] }, "/tmp/x.wav"), /at least one segment/);
});
