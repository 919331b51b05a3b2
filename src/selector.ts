import type { TrackCatalog } from "./catalog";
import { NoMatchingTrackError, RequestCancelledError } from "./errors";
import type { SelectionHistory } from "./history";
import { KeyedLock } from "./keyed-lock";
import { pickWeighted, type RandomSource } from "./random";
import type { MoodCategory, Track } from "./types";

export type TrackSelectorOptions = {
  random?: RandomSource;
  // tracks covering at least this share of the target are preferred over shorter ones
  minCoverageRatio?: number;
};

export class TrackSelector {
  private readonly lock = new KeyedLock<MoodCategory>();
  private readonly random: RandomSource;
  private readonly minCoverageRatio: number;

  constructor(
    private readonly catalog: TrackCatalog,
    private readonly history: SelectionHistory,
    options: TrackSelectorOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.minCoverageRatio = options.minCoverageRatio ?? 0.8;
  }

  /**
   * Picks a track for `mood` and records it in the history. Selections for the same mood
   * are serialized; the history is left untouched when the pick fails or the request was
   * aborted in the meantime.
   */
  async select(mood: MoodCategory, targetDurationSec: number, opts: { signal?: AbortSignal } = {}): Promise<Track> {
    return this.lock.runExclusive(mood, () => {
      const track = this.pick(mood, targetDurationSec);
      if (opts.signal?.aborted) {
        throw new RequestCancelledError("selection history update");
      }
      this.history.record(mood, track.id);
      return track;
    });
  }

  candidates(mood: MoodCategory, targetDurationSec: number): readonly Track[] {
    const pool = this.catalog.byMood(mood);
    if (!pool.length) {
      throw new NoMatchingTrackError(mood);
    }

    const window = [...this.history.window(mood)];
    let eligible = pool.filter((t) => !window.includes(t.id));
    while (!eligible.length && window.length) {
      window.shift();
      eligible = pool.filter((t) => !window.includes(t.id));
    }

    const covering = eligible.filter((t) => t.duration_sec >= targetDurationSec * this.minCoverageRatio);
    return covering.length ? covering : eligible;
  }

  private pick(mood: MoodCategory, targetDurationSec: number): Track {
    const candidates = this.candidates(mood, targetDurationSec);
    const seq = this.history.sequence(mood);
    const weights = candidates.map((t) => {
      const last = this.history.lastUsedAt(t.id);
      return last === undefined ? seq + 1 : seq - last;
    });
    return candidates[pickWeighted(weights, this.random)];
  }
}
