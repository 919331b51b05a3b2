import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { getDurationSec } from "./audio";
import { CatalogError } from "./errors";
import { log, logWarn } from "./log";
import {
  MIN_PLAYABLE_SEC,
  MOOD_CATEGORIES,
  TRACK_LOUDNESS_LUFS,
  type MoodCategory,
  type MoodProfile,
  type Track
} from "./types";

export const AUDIO_EXTENSIONS = ["mp3", "wav", "aac", "m4a", "ogg", "flac"];
const METADATA_FILE = "track_metadata.json";

const trackSchema = z.object({
  id: z.string().min(1),
  file_path: z.string().min(1),
  mood: z.enum(MOOD_CATEGORIES),
  tempo_bpm: z.number().int().positive(),
  key: z.string().min(1),
  duration_sec: z.number().min(MIN_PLAYABLE_SEC),
  energy: z.number().min(0).max(1).default(0.5),
  loudness_lufs: z.literal(TRACK_LOUDNESS_LUFS).default(TRACK_LOUDNESS_LUFS),
  description: z.string().optional(),
  source: z.string().optional()
});

const catalogSchema = z.array(trackSchema).min(1);

const metadataOverridesSchema = z.record(
  z.string(),
  z.object({
    energy: z.number().min(0).max(1).optional(),
    description: z.string().optional(),
    source: z.string().optional()
  })
);

export class TrackCatalog {
  private readonly tracks: readonly Track[];
  private readonly byId = new Map<string, Track>();
  private readonly moodIndex = new Map<MoodCategory, readonly Track[]>();

  constructor(tracks: Track[]) {
    const frozen = tracks.map((t) => Object.freeze({ ...t }));
    for (const track of frozen) {
      if (this.byId.has(track.id)) {
        throw new CatalogError(`Duplicate track id "${track.id}"`);
      }
      this.byId.set(track.id, track);
    }
    for (const mood of MOOD_CATEGORIES) {
      this.moodIndex.set(mood, Object.freeze(frozen.filter((t) => t.mood === mood)));
    }
    this.tracks = Object.freeze(frozen);
  }

  get size(): number {
    return this.tracks.length;
  }

  all(): readonly Track[] {
    return this.tracks;
  }

  byMood(mood: MoodCategory): readonly Track[] {
    return this.moodIndex.get(mood) ?? [];
  }

  get(id: string): Track | undefined {
    return this.byId.get(id);
  }

  countsByMood(): Record<MoodCategory, number> {
    const counts = {
      supportive_gentle: 0,
      hopeful_uplifting: 0,
      tense_to_calm: 0,
      reflective_emotional: 0,
      energetic_motivating: 0
    } satisfies Record<MoodCategory, number>;
    for (const mood of MOOD_CATEGORIES) {
      counts[mood] = this.byMood(mood).length;
    }
    return counts;
  }
}

export async function loadCatalog(filePath: string): Promise<TrackCatalog> {
  const raw = await readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  const result = catalogSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogError(`Invalid catalog ${filePath}: ${result.error.issues.map(formatIssue).join("; ")}`);
  }
  return new TrackCatalog(result.data);
}

function formatIssue(issue: z.ZodIssue): string {
  return `${issue.path.join(".") || "<root>"} ${issue.message}`;
}

const moodPattern = MOOD_CATEGORIES.join("|");
const fileNamePattern = new RegExp(
  `^(${moodPattern})_(\\d+)bpm_([^_]+)_(\\d+(?:\\.\\d+)?)s_(.+)_([^_]+)\\.(${AUDIO_EXTENSIONS.join("|")})$`,
  "i"
);

export type ParsedTrackName = {
  mood: MoodCategory;
  tempo_bpm: number;
  key: string;
  duration_sec: number;
  description: string;
  source: string;
  ext: string;
};

function asMood(value: string): MoodCategory | null {
  const lower = value.toLowerCase();
  return MOOD_CATEGORIES.find((m) => m === lower) ?? null;
}

/**
 * Parses `{mood}_{tempo}bpm_{key}_{duration}s_{description}_{source}.{ext}`.
 * Returns null when the name does not follow the convention.
 */
export function parseTrackFileName(fileName: string): ParsedTrackName | null {
  const m = fileNamePattern.exec(fileName);
  if (!m) return null;
  const [, moodRaw, tempo, key, duration, description, source, ext] = m;
  const mood = asMood(moodRaw);
  if (!mood) return null;
  return {
    mood,
    tempo_bpm: Number(tempo),
    key,
    duration_sec: Number(duration),
    description: description.replace(/-/g, " "),
    source,
    ext: ext.toLowerCase()
  };
}

async function readMetadataOverrides(dir: string): Promise<z.infer<typeof metadataOverridesSchema>> {
  let raw: string;
  try {
    raw = await readFile(path.join(dir, METADATA_FILE), "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(raw);
  const result = metadataOverridesSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogError(`Invalid ${METADATA_FILE}: ${result.error.issues.map(formatIssue).join("; ")}`);
  }
  return result.data;
}

async function listAudioFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory() && asMood(entry.name)) {
      const nested = await readdir(full, { withFileTypes: true });
      for (const inner of nested) {
        if (inner.isFile()) files.push(path.join(full, inner.name));
      }
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files.sort();
}

export async function scanCatalogDir(dir: string): Promise<TrackCatalog> {
  const overrides = await readMetadataOverrides(dir);
  const files = await listAudioFiles(dir);
  const tracks: Track[] = [];

  for (const file of files) {
    const name = path.basename(file);
    if (name === METADATA_FILE) continue;
    const parsed = parseTrackFileName(name);
    if (!parsed) {
      logWarn("catalog.scan.skip", { file, reason: "name does not follow catalog convention" });
      continue;
    }
    if (parsed.duration_sec < MIN_PLAYABLE_SEC) {
      logWarn("catalog.scan.skip", { file, reason: `shorter than ${MIN_PLAYABLE_SEC}s` });
      continue;
    }
    const id = name.slice(0, name.length - parsed.ext.length - 1);
    const extra = overrides[name];
    tracks.push({
      id,
      file_path: file,
      mood: parsed.mood,
      tempo_bpm: parsed.tempo_bpm,
      key: parsed.key,
      duration_sec: parsed.duration_sec,
      energy: extra?.energy ?? 0.5,
      loudness_lufs: TRACK_LOUDNESS_LUFS,
      description: extra?.description ?? parsed.description,
      source: extra?.source ?? parsed.source
    });
  }

  if (!tracks.length) {
    throw new CatalogError(`No catalog tracks found under ${dir}`);
  }
  log("catalog.scan.done", { dir, tracks: tracks.length });
  return new TrackCatalog(tracks);
}

export type CatalogAuditFinding = {
  trackId: string;
  mood: MoodCategory;
  tempoBpm: number;
  tempoRange: [number, number];
};

export function auditCatalog(
  catalog: TrackCatalog,
  profiles: Record<MoodCategory, MoodProfile>
): CatalogAuditFinding[] {
  const findings: CatalogAuditFinding[] = [];
  for (const track of catalog.all()) {
    const [min, max] = profiles[track.mood].tempoRange;
    if (track.tempo_bpm < min || track.tempo_bpm > max) {
      findings.push({ trackId: track.id, mood: track.mood, tempoBpm: track.tempo_bpm, tempoRange: [min, max] });
    }
  }
  return findings;
}

export const MAX_TRACK_SEC = 600;
const LENGTH_TOLERANCE_SEC = 5;

export type DurationProbe = (filePath: string) => Promise<number>;

export type TrackFileVerdict =
  | { ok: true; durationSec: number; warnings: string[] }
  | { ok: false; reason: string };

/** Judges a track against the length probed from its file; `null` means the file could not be read. */
export function assessTrackFile(track: Track, probedSec: number | null): TrackFileVerdict {
  if (probedSec === null) {
    return { ok: false, reason: "file missing or unreadable" };
  }
  if (!Number.isFinite(probedSec) || probedSec <= 0) {
    return { ok: false, reason: "zero or unreadable duration" };
  }
  if (probedSec < MIN_PLAYABLE_SEC) {
    return { ok: false, reason: `shorter than ${MIN_PLAYABLE_SEC}s (probed ${probedSec}s)` };
  }
  const warnings: string[] = [];
  const tolerance = Math.max(LENGTH_TOLERANCE_SEC, track.duration_sec * 0.1);
  if (Math.abs(probedSec - track.duration_sec) > tolerance) {
    warnings.push(`probed length ${probedSec}s differs from catalogued ${track.duration_sec}s`);
  }
  if (probedSec > MAX_TRACK_SEC) {
    warnings.push(`longer than ${MAX_TRACK_SEC}s (probed ${probedSec}s)`);
  }
  return { ok: true, durationSec: probedSec, warnings };
}

/**
 * Probes every track file and drops the ones that are missing or too short. Kept tracks
 * take the probed length.
 */
export async function validateTrackFiles(
  catalog: TrackCatalog,
  probe: DurationProbe = getDurationSec
): Promise<TrackCatalog> {
  const kept: Track[] = [];
  for (const track of catalog.all()) {
    let probedSec: number | null;
    try {
      probedSec = await probe(track.file_path);
    } catch (error) {
      logWarn("catalog.track.probe_failed", {
        trackId: track.id,
        file: track.file_path,
        error: error instanceof Error ? error.message : String(error)
      });
      probedSec = null;
    }

    const verdict = assessTrackFile(track, probedSec);
    if (!verdict.ok) {
      logWarn("catalog.track.skip", { trackId: track.id, file: track.file_path, reason: verdict.reason });
      continue;
    }
    for (const warning of verdict.warnings) {
      logWarn("catalog.track.check", { trackId: track.id, file: track.file_path, warning });
    }
    kept.push({ ...track, duration_sec: verdict.durationSec });
  }

  if (!kept.length) {
    throw new CatalogError(`None of the ${catalog.size} catalog tracks passed the file check`);
  }
  log("catalog.validate.done", { checked: catalog.size, kept: kept.length });
  return new TrackCatalog(kept);
}
