import { randomUUID } from "node:crypto";
import { auditCatalog, type TrackCatalog } from "./catalog";
import { MoodClassifier } from "./classifier";
import { buildDuckingPlan, normalizeSpeechTimeline, sliceEnvelope, type DuckingOptions } from "./ducking";
import { InvalidDurationError, isMixEngineError, RequestCancelledError } from "./errors";
import { SelectionHistory } from "./history";
import type { LibraryConfig } from "./library";
import { log, logError, logWarn } from "./log";
import { planSegments, type LoopTrimOptions } from "./loop-trim";
import type { RandomSource } from "./random";
import { RuntimeState } from "./runtime-state";
import { TrackSelector } from "./selector";
import { MIN_PLAYABLE_SEC, type MixPlan, type MoodCategory, type MusicSuggestion, type SpeechInterval } from "./types";

export type MixRequest = {
  contentType?: string;
  mood?: MoodCategory;
  emotionalContext?: string;
  targetDurationSec: number;
  speech?: SpeechInterval[];
  signal?: AbortSignal;
};

export type MixEngineOptions = {
  recencyWindow?: number;
  random?: RandomSource;
  loopTrim?: LoopTrimOptions;
  ducking?: DuckingOptions;
  runtime?: RuntimeState;
};

export class MixEngine {
  private readonly classifier: MoodClassifier;
  private readonly history: SelectionHistory;
  private readonly selector: TrackSelector;
  private readonly runtime: RuntimeState;

  constructor(
    private readonly catalog: TrackCatalog,
    private readonly library: LibraryConfig,
    private readonly options: MixEngineOptions = {}
  ) {
    this.classifier = new MoodClassifier(library);
    this.history = new SelectionHistory(options.recencyWindow);
    this.selector = new TrackSelector(catalog, this.history, { random: options.random });
    this.runtime = options.runtime ?? new RuntimeState();

    for (const finding of auditCatalog(catalog, library.profiles)) {
      logWarn("catalog.track.tempo_out_of_range", finding);
    }
    this.runtime.catalogLoaded(catalog.countsByMood());
  }

  getRuntimeState(): RuntimeState {
    return this.runtime;
  }

  getCatalog(): TrackCatalog {
    return this.catalog;
  }

  getHistory(): SelectionHistory {
    return this.history;
  }

  resolveMood(request: Pick<MixRequest, "contentType" | "mood" | "emotionalContext">): MoodCategory {
    if (request.mood) return request.mood;
    return this.classifier.classify(request.contentType ?? "", request.emotionalContext);
  }

  suggest(contentType: string): MusicSuggestion {
    return this.classifier.suggest(contentType, this.catalog);
  }

  async plan(request: MixRequest): Promise<MixPlan> {
    const id = randomUUID();
    try {
      const plan = await this.buildPlan(id, request);
      this.runtime.mixPlanned(plan);
      log("mix.planned", { requestId: id, mood: plan.mood, trackId: plan.track.id, durationSec: plan.durationSec });
      return plan;
    } catch (error) {
      const code = isMixEngineError(error) ? error.code : "Internal";
      const message = error instanceof Error ? error.message : String(error);
      this.runtime.mixFailed(id, code, message);
      logError("mix.failed", error, { requestId: id, code });
      throw error;
    }
  }

  private async buildPlan(id: string, request: MixRequest): Promise<MixPlan> {
    const durationSec = request.targetDurationSec;
    if (!Number.isFinite(durationSec) || durationSec <= 0) {
      throw new InvalidDurationError(durationSec, "must be a positive number of seconds");
    }
    if (durationSec < MIN_PLAYABLE_SEC) {
      throw new InvalidDurationError(durationSec, `shorter than the minimum playable length of ${MIN_PLAYABLE_SEC}s`);
    }
    const speech = request.speech ?? [];
    normalizeSpeechTimeline(speech, durationSec);

    const mood = this.resolveMood(request);
    if (request.signal?.aborted) {
      throw new RequestCancelledError("track selection");
    }
    const track = await this.selector.select(mood, durationSec, { signal: request.signal });
    this.runtime.trackSelected(id, mood, track.id);

    const profile = this.library.profiles[mood];
    const segmentPlan = planSegments(track, durationSec, this.options.loopTrim);
    const ducking = buildDuckingPlan(durationSec, profile, speech, this.options.ducking);

    return {
      id,
      contentType: request.contentType ?? null,
      mood,
      track,
      durationSec,
      looped: segmentPlan.looped,
      volume: profile.volume,
      duckRatio: profile.duckRatio,
      entries: segmentPlan.segments.map((segment) => ({
        segment,
        gain: sliceEnvelope(ducking.envelope, segment.outputStartSec, segment.outputEndSec)
      })),
      envelope: ducking.envelope,
      duckedRegions: ducking.regions,
      createdAt: new Date().toISOString()
    };
  }
}
