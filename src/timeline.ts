import { sliceEnvelope } from "./ducking";
import { execCmd } from "./proc";
import type { CrossfadeCurve, GainPoint, MixPlan } from "./types";

export type RenderClip = {
  filePath: string;
  startSec: number;
  sourceOffsetSec?: number;
  durationSec?: number;
  gainExpr: string;
  fadeInSec?: number;
  fadeOutSec?: number;
  curve?: CrossfadeCurve;
};

export type RenderOptions = {
  narrationFile?: string;
  master?: boolean;
  masterLufs?: number;
  signal?: AbortSignal;
};

function fmt(n: number): string {
  return String(Number(n.toFixed(6)));
}

/**
 * Piecewise-linear gain as an ffmpeg expression over the clip-local time `t`
 * (`t = 0` at `originSec` on the output timeline).
 */
export function envelopeExpression(points: GainPoint[], originSec: number): string {
  if (!points.length) return "0";
  let expr = fmt(points[points.length - 1].gain);
  for (let i = points.length - 1; i >= 1; i -= 1) {
    const a = points[i - 1];
    const b = points[i];
    const span = b.timeSec - a.timeSec;
    if (span <= 0) continue;
    const x0 = a.timeSec - originSec;
    const x1 = b.timeSec - originSec;
    const piece = Math.abs(b.gain - a.gain) < 1e-9
      ? fmt(a.gain)
      : `${fmt(a.gain)}+(${fmt(b.gain - a.gain)})*(t-${fmt(x0)})/${fmt(span)}`;
    if (piece === expr) continue;
    expr = `if(lt(t,${fmt(x1)}),${piece},${expr})`;
  }
  return expr;
}

export function clipsForPlan(plan: MixPlan): RenderClip[] {
  return plan.entries.map(({ segment }) => {
    const ownedSec = segment.outputEndSec - segment.outputStartSec;
    const durationSec = ownedSec + segment.crossfadeOutSec;
    const endSec = Math.min(plan.durationSec, segment.outputStartSec + durationSec);
    const gain = sliceEnvelope(plan.envelope, segment.outputStartSec, endSec);
    return {
      filePath: plan.track.file_path,
      startSec: segment.outputStartSec,
      sourceOffsetSec: segment.sourceStartSec,
      durationSec,
      gainExpr: envelopeExpression(gain, segment.outputStartSec),
      fadeInSec: segment.fadeInSec || segment.crossfadeInSec,
      fadeOutSec: segment.fadeOutSec || segment.crossfadeOutSec,
      curve: segment.curve
    };
  });
}

export function buildFilterGraph(clips: RenderClip[], opts: Pick<RenderOptions, "master" | "masterLufs"> = {}): string {
  const lines: string[] = [];
  const delayedLabels: string[] = [];

  for (let i = 0; i < clips.length; i += 1) {
    const clip = clips[i];
    const inLabel = `[${i}:a]`;
    const sourceOffsetSec = Math.max(0, clip.sourceOffsetSec || 0);
    const trim = clip.durationSec && clip.durationSec > 0
      ? `atrim=start=${fmt(sourceOffsetSec)}:end=${fmt(sourceOffsetSec + clip.durationSec)},`
      : sourceOffsetSec > 0
        ? `atrim=start=${fmt(sourceOffsetSec)},`
        : "";
    const curve = clip.curve ?? "tri";
    const fadeIn = clip.fadeInSec && clip.fadeInSec > 0
      ? `,afade=t=in:st=0:d=${fmt(clip.fadeInSec)}:curve=${curve}`
      : "";
    const fadeOutSec = clip.fadeOutSec && clip.durationSec ? Math.min(clip.fadeOutSec, clip.durationSec) : 0;
    const fadeOut = clip.durationSec && fadeOutSec > 0
      ? `,afade=t=out:st=${fmt(clip.durationSec - fadeOutSec)}:d=${fmt(fadeOutSec)}:curve=${curve}`
      : "";
    const pre = `c${i}`;
    lines.push(`${inLabel}${trim}asetpts=PTS-STARTPTS,volume='${clip.gainExpr}':eval=frame${fadeIn}${fadeOut}[${pre}]`);

    const delayMs = Math.max(0, Math.round((clip.startSec || 0) * 1000));
    const out = `d${i}`;
    lines.push(`[${pre}]adelay=${delayMs}|${delayMs}[${out}]`);
    delayedLabels.push(`[${out}]`);
  }

  const mixedLabel = "mix0";
  lines.push(`${delayedLabels.join("")}amix=inputs=${clips.length}:duration=longest:normalize=0[${mixedLabel}]`);

  if (opts.master !== false) {
    const lufs = opts.masterLufs ?? -14;
    lines.push(
      `[${mixedLabel}]loudnorm=I=${fmt(lufs)}:TP=-1.5:LRA=7,acompressor=threshold=-18dB:ratio=2.4:attack=20:release=180,alimiter=limit=0.89[out]`
    );
  } else {
    lines.push(`[${mixedLabel}]anull[out]`);
  }
  return lines.join(";");
}

export async function renderMixPlan(plan: MixPlan, outFile: string, opts: RenderOptions = {}): Promise<void> {
  const clips = clipsForPlan(plan);
  if (!clips.length) {
    throw new Error("renderMixPlan requires a plan with at least one segment");
  }
  if (opts.narrationFile) {
    clips.push({ filePath: opts.narrationFile, startSec: 0, gainExpr: "1" });
  }

  const args: string[] = ["-y"];
  for (const c of clips) {
    args.push("-i", c.filePath);
  }
  args.push(
    "-filter_complex",
    buildFilterGraph(clips, opts),
    "-map",
    "[out]",
    "-t",
    fmt(plan.durationSec),
    "-ar",
    "48000",
    "-ac",
    "2",
    outFile
  );

  await execCmd("ffmpeg", args, { signal: opts.signal });
}
