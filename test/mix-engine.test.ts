import test from "node:test";
import assert from "node:assert/strict";
import { sliceEnvelope } from "../src/ducking";
import { MixEngine } from "../src/mix-engine";
import { createRng } from "../src/random";
import { makeCatalog, makeTrack, testLibrary } from "./fixtures";

function makeEngine(options: { defaultMood?: "supportive_gentle" } = {}) {
  const catalog = makeCatalog([
    makeTrack("gentle-a", "supportive_gentle", 120),
    makeTrack("gentle-b", "supportive_gentle", 150),
    makeTrack("gentle-c", "supportive_gentle", 180),
    makeTrack("calm-a", "tense_to_calm", 90),
    makeTrack("sad-a", "reflective_emotional", 200)
  ]);
  const library = testLibrary({ defaultMood: options.defaultMood ?? null });
  return new MixEngine(catalog, library, { random: createRng(3) });
}

test("plan maps the content type to a mood and picks a matching track", async () => {
  const engine = makeEngine();
  const plan = await engine.plan({ contentType: "validation", targetDurationSec: 60 });
  assert.equal(plan.mood, "supportive_gentle");
  assert.equal(plan.track.mood, "supportive_gentle");
  assert.equal(plan.contentType, "validation");
  assert.equal(plan.volume, 0.18);
  assert.equal(plan.duckRatio, 0.25);
  assert.equal(plan.looped, false);
  assert.equal(plan.entries.length, 1);
  assert.equal(plan.entries[0].segment.outputEndSec, 60);
});

test("plan loops a short track and slices the envelope per segment", async () => {
  const engine = makeEngine();
  const plan = await engine.plan({
    contentType: "chaos_story",
    targetDurationSec: 200,
    speech: [{ startSec: 80, endSec: 100 }]
  });
  assert.equal(plan.track.id, "calm-a");
  assert.equal(plan.looped, true);
  assert.deepEqual(
    plan.entries.map((e) => [e.segment.outputStartSec, e.segment.outputEndSec]),
    [
      [0, 87],
      [87, 174],
      [174, 200]
    ]
  );
  for (const entry of plan.entries) {
    assert.deepEqual(
      entry.gain,
      sliceEnvelope(plan.envelope, entry.segment.outputStartSec, entry.segment.outputEndSec)
    );
  }
  assert.deepEqual(plan.duckedRegions, [{ startSec: 80, endSec: 100 }]);
});

test("an explicit mood bypasses the classifier", async () => {
  const engine = makeEngine();
  const plan = await engine.plan({ mood: "reflective_emotional", targetDurationSec: 60 });
  assert.equal(plan.track.id, "sad-a");
  assert.equal(plan.contentType, null);
});

test("an emotional context hint overrides the content type mapping", async () => {
  const engine = makeEngine();
  const plan = await engine.plan({ contentType: "validation", emotionalContext: "sad", targetDurationSec: 60 });
  assert.equal(plan.mood, "reflective_emotional");
});

test("unknown content types fail unless a default mood is configured", async () => {
  await assert.rejects(makeEngine().plan({ contentType: "podcast", targetDurationSec: 60 }), {
    code: "UnknownContentType"
  });
  const plan = await makeEngine({ defaultMood: "supportive_gentle" }).plan({
    contentType: "podcast",
    targetDurationSec: 60
  });
  assert.equal(plan.mood, "supportive_gentle");
});

test("invalid durations are rejected before any selection", async () => {
  const engine = makeEngine();
  for (const targetDurationSec of [0, -5, Number.NaN, 10]) {
    await assert.rejects(engine.plan({ contentType: "validation", targetDurationSec }), {
      code: "InvalidDuration"
    });
  }
  assert.deepEqual(engine.getHistory().window("supportive_gentle"), []);
  const snapshot = engine.getRuntimeState().snapshot();
  assert.equal(snapshot.stats.failuresByCode.InvalidDuration, 4);
  assert.equal(snapshot.stats.mixesPlanned, 0);
});

test("a malformed speech timeline leaves the history untouched", async () => {
  const engine = makeEngine();
  await assert.rejects(
    engine.plan({
      contentType: "validation",
      targetDurationSec: 60,
      speech: [
        { startSec: 10, endSec: 20 },
        { startSec: 15, endSec: 25 }
      ]
    }),
    { code: "MalformedSpeechTimeline" }
  );
  assert.deepEqual(engine.getHistory().window("supportive_gentle"), []);
});

test("moods without tracks fail with NoMatchingTrack", async () => {
  const engine = makeEngine();
  await assert.rejects(engine.plan({ contentType: "tips", targetDurationSec: 60 }), { code: "NoMatchingTrack" });
});

test("a cancelled request does not consume a selection", async () => {
  const engine = makeEngine();
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(
    engine.plan({ contentType: "validation", targetDurationSec: 60, signal: controller.signal }),
    { code: "RequestCancelled" }
  );
  assert.equal(engine.getHistory().sequence("supportive_gentle"), 0);
});

test("concurrent plans for one mood get distinct tracks", async () => {
  const engine = makeEngine();
  const plans = await Promise.all([
    engine.plan({ contentType: "validation", targetDurationSec: 60 }),
    engine.plan({ contentType: "general", targetDurationSec: 60 }),
    engine.plan({ mood: "supportive_gentle", targetDurationSec: 60 })
  ]);
  assert.deepEqual(plans.map((p) => p.track.id).sort(), ["gentle-a", "gentle-b", "gentle-c"]);
  assert.equal(new Set(plans.map((p) => p.id)).size, 3);
});

test("planned mixes are reported through the runtime state", async () => {
  const engine = makeEngine();
  const seen: string[] = [];
  engine.getRuntimeState().subscribe((event) => seen.push(event.event));
  const plan = await engine.plan({ contentType: "confession", targetDurationSec: 90 });

  assert.deepEqual(seen, ["track.selected", "mix.planned"]);
  const snapshot = engine.getRuntimeState().snapshot();
  assert.equal(snapshot.tracksLoaded, 5);
  assert.equal(snapshot.stats.mixesPlanned, 1);
  assert.equal(snapshot.stats.selectionsByMood.reflective_emotional, 1);
  assert.equal(snapshot.recentMixes[0].id, plan.id);
  assert.equal(snapshot.recentMixes[0].trackId, "sad-a");
});

test("suggest reports the profile and available tracks", () => {
  const suggestion = makeEngine().suggest("general");
  assert.equal(suggestion.mood, "supportive_gentle");
  assert.equal(suggestion.availableTracks, 3);
});

test("a target longer than every track yields a looped plan covering it", async () => {
  const catalog = makeCatalog([
    makeTrack("sad-120", "reflective_emotional", 120),
    makeTrack("sad-90", "reflective_emotional", 90),
    makeTrack("sad-200", "reflective_emotional", 200)
  ]);
  const engine = new MixEngine(catalog, testLibrary(), { random: createRng(9) });
  const plan = await engine.plan({ contentType: "confession", targetDurationSec: 300 });

  assert.equal(plan.mood, "reflective_emotional");
  assert.equal(plan.looped, true);
  assert.ok(plan.entries.length >= 2);
  const covered = plan.entries.reduce((acc, e) => acc + (e.segment.outputEndSec - e.segment.outputStartSec), 0);
  assert.equal(covered, 300);
  assert.equal(plan.entries[0].segment.outputStartSec, 0);
  for (let i = 1; i < plan.entries.length; i += 1) {
    assert.equal(plan.entries[i].segment.outputStartSec, plan.entries[i - 1].segment.outputEndSec);
  }
});
