import path from "node:path";
import { config as loadDotenv } from "dotenv";
import type { CrossfadeCurve, MoodCategory } from "./types";
import { MOOD_CATEGORIES } from "./types";

loadDotenv({ path: process.env.DOTENV_PATH || path.resolve(process.cwd(), ".env") });
loadDotenv();

const CURVES: CrossfadeCurve[] = ["tri", "log", "exp", "qsin"];

function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const v = Number(raw);
  if (!Number.isFinite(v)) {
    throw new Error(`Env var ${name} must be a number, got "${raw}"`);
  }
  return v;
}

function moodEnv(name: string): MoodCategory | null {
  const raw = process.env[name];
  if (!raw) return null;
  const mood = MOOD_CATEGORIES.find((m) => m === raw);
  if (!mood) {
    throw new Error(`Env var ${name} must be one of ${MOOD_CATEGORIES.join(", ")}, got "${raw}"`);
  }
  return mood;
}

function curveEnv(name: string, fallback: CrossfadeCurve): CrossfadeCurve {
  const raw = process.env[name];
  if (!raw) return fallback;
  const curve = CURVES.find((c) => c === raw);
  if (!curve) {
    throw new Error(`Env var ${name} must be one of ${CURVES.join(", ")}, got "${raw}"`);
  }
  return curve;
}

export const appConfig = {
  port: numberEnv("PORT", 3000),
  catalogPath: process.env.CATALOG_PATH || path.resolve(process.cwd(), "catalog/tracks.json"),
  catalogDir: process.env.CATALOG_DIR || "",
  validateTrackFiles: process.env.VALIDATE_TRACK_FILES === "true",
  libraryConfigPath: process.env.LIBRARY_CONFIG_PATH || path.resolve(process.cwd(), "config/music-library.json"),
  defaultMood: moodEnv("DEFAULT_MOOD"),
  recencyWindow: numberEnv("RECENCY_WINDOW", 20),
  duckTransitionSec: numberEnv("DUCK_TRANSITION_SEC", 0.4),
  crossfadeSec: numberEnv("CROSSFADE_SEC", 3),
  fadeInSec: numberEnv("FADE_IN_SEC", 3),
  fadeOutSec: numberEnv("FADE_OUT_SEC", 4),
  crossfadeCurve: curveEnv("CROSSFADE_CURVE", "tri"),
  masterLufs: numberEnv("MASTER_LUFS", -14),
  workDir: process.env.WORK_DIR || "/tmp/mood-mix",
  narrationDir: process.env.NARRATION_DIR || process.env.WORK_DIR || "/tmp/mood-mix",
  selectionSeed: process.env.SELECTION_SEED ? numberEnv("SELECTION_SEED", 0) : null
};
