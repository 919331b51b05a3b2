import { InvalidDurationError } from "./errors";
import type { CrossfadeCurve, PlanSegment, SegmentPlan, Track } from "./types";

export type LoopTrimOptions = {
  crossfadeSec?: number;
  fadeInSec?: number;
  fadeOutSec?: number;
  curve?: CrossfadeCurve;
};

export const CROSSFADE_RANGE: [number, number] = [2, 5];
export const FADE_IN_RANGE: [number, number] = [2, 5];
export const FADE_OUT_RANGE: [number, number] = [3, 6];

function clamp(value: number, [min, max]: [number, number]): number {
  return Math.max(min, Math.min(max, value));
}

/** Scales both fades down by the same factor when they would not fit inside `durationSec`. */
export function fitFades(fadeInSec: number, fadeOutSec: number, durationSec: number): [number, number] {
  const sum = fadeInSec + fadeOutSec;
  if (sum <= durationSec || sum <= 0) {
    return [fadeInSec, fadeOutSec];
  }
  const factor = durationSec / sum;
  return [fadeInSec * factor, fadeOutSec * factor];
}

export function planSegments(track: Track, targetDurationSec: number, options: LoopTrimOptions = {}): SegmentPlan {
  if (!Number.isFinite(targetDurationSec) || targetDurationSec <= 0) {
    throw new InvalidDurationError(targetDurationSec, "must be a positive, finite number of seconds");
  }
  const trackSec = track.duration_sec;
  if (!Number.isFinite(trackSec) || trackSec <= 0) {
    throw new InvalidDurationError(targetDurationSec, `track "${track.id}" has an unusable length of ${trackSec}s`);
  }
  const curve = options.curve ?? "tri";
  const requestedIn = clamp(options.fadeInSec ?? 3, FADE_IN_RANGE);
  const requestedOut = clamp(options.fadeOutSec ?? 4, FADE_OUT_RANGE);

  if (targetDurationSec <= trackSec) {
    const [fadeInSec, fadeOutSec] = fitFades(requestedIn, requestedOut, targetDurationSec);
    return {
      trackId: track.id,
      durationSec: targetDurationSec,
      looped: false,
      segments: [
        {
          index: 0,
          outputStartSec: 0,
          outputEndSec: targetDurationSec,
          sourceStartSec: 0,
          sourceEndSec: targetDurationSec,
          fadeInSec,
          fadeOutSec,
          crossfadeInSec: 0,
          crossfadeOutSec: 0,
          curve
        }
      ]
    };
  }

  // each repetition owns `step` seconds of output; the last `crossfade` seconds of the
  // track keep sounding under the start of the next repetition
  const crossfade = Math.min(clamp(options.crossfadeSec ?? 3, CROSSFADE_RANGE), trackSec / 2);
  const step = trackSec - crossfade;
  const segments: PlanSegment[] = [];

  // the last repetition must hold its crossfade-in and the whole fade-out
  const minLastSec = Math.min(requestedOut + crossfade, trackSec);

  for (let i = 0; ; i += 1) {
    let outputStartSec = i * step;
    const last = outputStartSec + trackSec >= targetDurationSec;
    if (last && i > 0 && targetDurationSec - outputStartSec < minLastSec) {
      outputStartSec = targetDurationSec - minLastSec;
      const previous = segments[i - 1];
      previous.outputEndSec = outputStartSec;
      previous.sourceEndSec = outputStartSec - previous.outputStartSec;
    }
    const outputEndSec = last ? targetDurationSec : (i + 1) * step;
    segments.push({
      index: i,
      outputStartSec,
      outputEndSec,
      sourceStartSec: 0,
      sourceEndSec: outputEndSec - outputStartSec,
      fadeInSec: i === 0 ? requestedIn : 0,
      fadeOutSec: last ? requestedOut : 0,
      crossfadeInSec: i === 0 ? 0 : crossfade,
      crossfadeOutSec: last ? 0 : crossfade,
      curve
    });
    if (last) break;
  }

  return {
    trackId: track.id,
    durationSec: targetDurationSec,
    looped: true,
    segments
  };
}

export function coveredDurationSec(plan: SegmentPlan): number {
  return plan.segments.reduce((acc, s) => acc + (s.outputEndSec - s.outputStartSec), 0);
}
