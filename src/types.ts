export const MOOD_CATEGORIES = [
  "supportive_gentle",
  "hopeful_uplifting",
  "tense_to_calm",
  "reflective_emotional",
  "energetic_motivating"
] as const;

export type MoodCategory = (typeof MOOD_CATEGORIES)[number];

export const TRACK_LOUDNESS_LUFS = -23;
export const MIN_PLAYABLE_SEC = 30;

export type Track = {
  id: string;
  file_path: string;
  mood: MoodCategory;
  tempo_bpm: number;
  key: string;
  duration_sec: number;
  energy: number;
  loudness_lufs: number;
  description?: string;
  source?: string;
};

export type MoodProfile = {
  mood: MoodCategory;
  description: string;
  tempoRange: [number, number];
  volume: number;
  duckRatio: number;
  searchTerms: string[];
};

export type CrossfadeCurve = "tri" | "log" | "exp" | "qsin";

export type SpeechInterval = {
  startSec: number;
  endSec: number;
};

export type PlanSegment = {
  index: number;
  outputStartSec: number;
  outputEndSec: number;
  sourceStartSec: number;
  sourceEndSec: number;
  fadeInSec: number;
  fadeOutSec: number;
  crossfadeInSec: number;
  crossfadeOutSec: number;
  curve: CrossfadeCurve;
};

export type SegmentPlan = {
  trackId: string;
  durationSec: number;
  looped: boolean;
  segments: PlanSegment[];
};

export type GainPoint = {
  timeSec: number;
  gain: number;
};

export type MixPlanEntry = {
  segment: PlanSegment;
  gain: GainPoint[];
};

export type MixPlan = {
  id: string;
  contentType: string | null;
  mood: MoodCategory;
  track: Track;
  durationSec: number;
  looped: boolean;
  volume: number;
  duckRatio: number;
  entries: MixPlanEntry[];
  envelope: GainPoint[];
  duckedRegions: SpeechInterval[];
  createdAt: string;
};

export type MusicSuggestion = {
  contentType: string;
  mood: MoodCategory;
  profile: MoodProfile;
  availableTracks: number;
  searchTerms: string[];
};

export type EngineEvent = {
  ts: string;
  event: string;
  payload: Record<string, unknown>;
};

export type MixSummary = {
  id: string;
  contentType: string | null;
  mood: MoodCategory;
  trackId: string;
  durationSec: number;
  looped: boolean;
  duckedRegions: number;
  plannedAt: string;
};

export type EngineErrorItem = {
  ts: string;
  code: string;
  message: string;
};

export type EngineSnapshot = {
  tracksLoaded: number;
  tracksByMood: Record<MoodCategory, number>;
  recentMixes: MixSummary[];
  recentEvents: EngineEvent[];
  recentErrors: EngineErrorItem[];
  stats: {
    mixesPlanned: number;
    mixesRendered: number;
    selectionsByMood: Record<MoodCategory, number>;
    failuresByCode: Record<string, number>;
  };
};
