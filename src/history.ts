import type { MoodCategory } from "./types";

export const DEFAULT_RECENCY_WINDOW = 20;

/**
 * Recent selections per mood, oldest first. Also remembers the per-mood sequence number at
 * which each track was last picked so selection can weigh staleness beyond the window.
 */
export class SelectionHistory {
  private readonly recent = new Map<MoodCategory, string[]>();
  private readonly counters = new Map<MoodCategory, number>();
  private readonly lastUsed = new Map<string, number>();

  constructor(readonly windowSize = DEFAULT_RECENCY_WINDOW) {
    if (!Number.isInteger(windowSize) || windowSize < 0) {
      throw new Error(`Recency window must be a non-negative integer, got ${windowSize}`);
    }
  }

  window(mood: MoodCategory): readonly string[] {
    return this.recent.get(mood) ?? [];
  }

  sequence(mood: MoodCategory): number {
    return this.counters.get(mood) ?? 0;
  }

  lastUsedAt(trackId: string): number | undefined {
    return this.lastUsed.get(trackId);
  }

  record(mood: MoodCategory, trackId: string): void {
    const seq = this.sequence(mood) + 1;
    this.counters.set(mood, seq);
    this.lastUsed.set(trackId, seq);

    if (this.windowSize === 0) return;
    const list = [...this.window(mood), trackId];
    if (list.length > this.windowSize) {
      list.splice(0, list.length - this.windowSize);
    }
    this.recent.set(mood, list);
  }

  clear(): void {
    this.recent.clear();
    this.counters.clear();
    this.lastUsed.clear();
  }
}
