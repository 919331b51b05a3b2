import { readFileSync } from "node:fs";
import path from "node:path";
import { TrackCatalog } from "../src/catalog";
import { parseLibraryConfig, type LibraryConfig } from "../src/library";
import type { MoodCategory, Track } from "../src/types";

export function makeTrack(id: string, mood: MoodCategory, durationSec: number, extra: Partial<Track> = {}): Track {
  return {
    id,
    file_path: `/music/${mood}/${id}.wav`,
    mood,
    tempo_bpm: 72,
    key: "C",
    duration_sec: durationSec,
    energy: 0.4,
    loudness_lufs: -23,
    ...extra
  };
}

export function makeCatalog(tracks: Track[]): TrackCatalog {
  return new TrackCatalog(tracks);
}

export function testLibrary(overrides: Partial<LibraryConfig> = {}): LibraryConfig {
  const file = path.resolve(__dirname, "../config/music-library.json");
  const library = parseLibraryConfig(JSON.parse(readFileSync(file, "utf-8")));
  return { ...library, ...overrides };
}
