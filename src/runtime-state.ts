import type {
  EngineErrorItem,
  EngineEvent,
  EngineSnapshot,
  MixPlan,
  MixSummary,
  MoodCategory
} from "./types";

const MAX_RECENT_EVENTS = 200;
const MAX_RECENT_MIXES = 50;
const MAX_RECENT_ERRORS = 50;

type Listener = (event: EngineEvent) => void;

function trimNewest<T>(items: T[], max: number): T[] {
  return items.slice(0, max);
}

function emptyMoodCounts(): Record<MoodCategory, number> {
  return {
    supportive_gentle: 0,
    hopeful_uplifting: 0,
    tense_to_calm: 0,
    reflective_emotional: 0,
    energetic_motivating: 0
  };
}

function cloneSnapshot(snapshot: EngineSnapshot): EngineSnapshot {
  return structuredClone(snapshot);
}

function summarize(plan: MixPlan): MixSummary {
  return {
    id: plan.id,
    contentType: plan.contentType,
    mood: plan.mood,
    trackId: plan.track.id,
    durationSec: plan.durationSec,
    looped: plan.looped,
    duckedRegions: plan.duckedRegions.length,
    plannedAt: plan.createdAt
  };
}

export class RuntimeState {
  private listeners = new Set<Listener>();

  private snapshotState: EngineSnapshot = {
    tracksLoaded: 0,
    tracksByMood: emptyMoodCounts(),
    recentMixes: [],
    recentEvents: [],
    recentErrors: [],
    stats: {
      mixesPlanned: 0,
      mixesRendered: 0,
      selectionsByMood: emptyMoodCounts(),
      failuresByCode: {}
    }
  };

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): EngineSnapshot {
    return cloneSnapshot(this.snapshotState);
  }

  catalogLoaded(tracksByMood: Record<MoodCategory, number>): void {
    const total = Object.values(tracksByMood).reduce((acc, n) => acc + n, 0);
    this.snapshotState.tracksLoaded = total;
    this.snapshotState.tracksByMood = { ...tracksByMood };
    this.emit("catalog.loaded", { tracks: total, tracksByMood });
  }

  trackSelected(requestId: string, mood: MoodCategory, trackId: string): void {
    this.snapshotState.stats.selectionsByMood[mood] += 1;
    this.emit("track.selected", { requestId, mood, trackId });
  }

  mixPlanned(plan: MixPlan): void {
    this.snapshotState.stats.mixesPlanned += 1;
    this.snapshotState.recentMixes = trimNewest([summarize(plan), ...this.snapshotState.recentMixes], MAX_RECENT_MIXES);
    this.emit("mix.planned", {
      requestId: plan.id,
      mood: plan.mood,
      trackId: plan.track.id,
      durationSec: plan.durationSec,
      segments: plan.entries.length,
      duckedRegions: plan.duckedRegions.length
    });
  }

  mixRendered(requestId: string, outFile: string): void {
    this.snapshotState.stats.mixesRendered += 1;
    this.emit("mix.rendered", { requestId, outFile });
  }

  mixFailed(requestId: string, code: string, message: string): void {
    const failures = this.snapshotState.stats.failuresByCode;
    failures[code] = (failures[code] ?? 0) + 1;
    const item: EngineErrorItem = { ts: new Date().toISOString(), code, message };
    this.snapshotState.recentErrors = trimNewest([item, ...this.snapshotState.recentErrors], MAX_RECENT_ERRORS);
    this.emit("mix.failed", { requestId, code, message });
  }

  private emit(event: string, payload: Record<string, unknown>): void {
    const entry: EngineEvent = { ts: new Date().toISOString(), event, payload };
    this.snapshotState.recentEvents = trimNewest([entry, ...this.snapshotState.recentEvents], MAX_RECENT_EVENTS);
    for (const listener of this.listeners) {
      listener(entry);
    }
  }
}
