import { MalformedSpeechTimelineError } from "./errors";
import type { GainPoint, MoodProfile, SpeechInterval } from "./types";

export const DEFAULT_TRANSITION_SEC = 0.4;

export type DuckingOptions = {
  transitionSec?: number;
};

export type DuckingPlan = {
  regions: SpeechInterval[];
  envelope: GainPoint[];
};

/**
 * Validates a speech timeline and clips it to `[0, durationSec]`. Intervals must be sorted
 * and must not overlap; touching intervals are allowed.
 */
export function normalizeSpeechTimeline(timeline: SpeechInterval[], durationSec: number): SpeechInterval[] {
  const out: SpeechInterval[] = [];
  let prevEnd = -Infinity;
  timeline.forEach((interval, index) => {
    const { startSec, endSec } = interval;
    if (!Number.isFinite(startSec) || !Number.isFinite(endSec)) {
      throw new MalformedSpeechTimelineError(index, interval, "has non-numeric bounds");
    }
    if (startSec < 0) {
      throw new MalformedSpeechTimelineError(index, interval, "starts before 0");
    }
    if (endSec <= startSec) {
      throw new MalformedSpeechTimelineError(index, interval, "ends before it starts");
    }
    if (startSec < prevEnd) {
      throw new MalformedSpeechTimelineError(index, interval, "overlaps or precedes the previous interval");
    }
    prevEnd = endSec;
    if (startSec >= durationSec) return;
    out.push({ startSec, endSec: Math.min(endSec, durationSec) });
  });
  return out;
}

/** Merges intervals separated by less than one full transition cycle (down + up). */
export function mergeSpeechRegions(intervals: SpeechInterval[], transitionSec: number): SpeechInterval[] {
  const cycle = 2 * transitionSec;
  const merged: SpeechInterval[] = [];
  for (const interval of intervals) {
    const prev = merged[merged.length - 1];
    if (prev && interval.startSec - prev.endSec < cycle) {
      prev.endSec = Math.max(prev.endSec, interval.endSec);
    } else {
      merged.push({ ...interval });
    }
  }
  return merged;
}

export function gainAt(envelope: GainPoint[], timeSec: number): number {
  if (!envelope.length) return 0;
  const first = envelope[0];
  if (timeSec <= first.timeSec) return first.gain;
  for (let i = 1; i < envelope.length; i += 1) {
    const b = envelope[i];
    if (timeSec <= b.timeSec) {
      const a = envelope[i - 1];
      const span = b.timeSec - a.timeSec;
      if (span <= 0) return b.gain;
      return a.gain + ((b.gain - a.gain) * (timeSec - a.timeSec)) / span;
    }
  }
  return envelope[envelope.length - 1].gain;
}

function pushPoint(points: GainPoint[], timeSec: number, gain: number): void {
  const last = points[points.length - 1];
  if (last && Math.abs(last.timeSec - timeSec) < 1e-9) {
    last.gain = gain;
    return;
  }
  points.push({ timeSec, gain });
}

/**
 * Builds the ducking gain envelope: `volume` outside speech, `volume * duckRatio` while
 * speech holds, linear ramps of `transitionSec` starting at each region's start and end.
 */
export function buildDuckingPlan(
  durationSec: number,
  profile: Pick<MoodProfile, "volume" | "duckRatio">,
  timeline: SpeechInterval[],
  options: DuckingOptions = {}
): DuckingPlan {
  const transitionSec = options.transitionSec ?? DEFAULT_TRANSITION_SEC;
  if (!(transitionSec > 0)) {
    throw new Error(`Ducking transition must be positive, got ${transitionSec}`);
  }
  if (!(profile.duckRatio >= 0 && profile.duckRatio < 1)) {
    throw new Error(`Duck ratio must be in [0, 1), got ${profile.duckRatio}`);
  }
  const base = profile.volume;
  const ducked = base * profile.duckRatio;
  const regions = mergeSpeechRegions(normalizeSpeechTimeline(timeline, durationSec), transitionSec);

  const points: GainPoint[] = [{ timeSec: 0, gain: base }];
  for (const region of regions) {
    const downSec = Math.min(transitionSec, region.endSec - region.startSec);
    const holdGain = rampValue(base, ducked, downSec / transitionSec);
    pushPoint(points, region.startSec, base);
    pushPoint(points, region.startSec + downSec, holdGain);
    pushPoint(points, region.endSec, holdGain);

    const upEnd = region.endSec + transitionSec;
    if (upEnd <= durationSec) {
      pushPoint(points, upEnd, base);
    } else {
      pushPoint(points, durationSec, rampValue(holdGain, base, (durationSec - region.endSec) / transitionSec));
    }
  }
  const tail = points[points.length - 1];
  if (tail.timeSec < durationSec) {
    pushPoint(points, durationSec, tail.gain);
  }

  return { regions, envelope: points };
}

function rampValue(from: number, to: number, fraction: number): number {
  if (fraction >= 1) return to;
  if (fraction <= 0) return from;
  return from + (to - from) * fraction;
}

/** Cuts the envelope to `[startSec, endSec]`, keeping absolute times. */
export function sliceEnvelope(envelope: GainPoint[], startSec: number, endSec: number): GainPoint[] {
  const out: GainPoint[] = [{ timeSec: startSec, gain: gainAt(envelope, startSec) }];
  for (const p of envelope) {
    if (p.timeSec > startSec && p.timeSec < endSec) {
      out.push({ ...p });
    }
  }
  if (endSec > startSec) {
    out.push({ timeSec: endSec, gain: gainAt(envelope, endSec) });
  }
  return out;
}
