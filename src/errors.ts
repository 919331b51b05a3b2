import type { SpeechInterval } from "./types";

export type MixErrorCode =
  | "UnknownContentType"
  | "NoMatchingTrack"
  | "InvalidDuration"
  | "MalformedSpeechTimeline"
  | "RequestCancelled"
  | "CatalogError"
  | "InvalidNarrationPath";

export class MixEngineError extends Error {
  constructor(readonly code: MixErrorCode, message: string) {
    super(message);
    this.name = code;
  }
}

export class UnknownContentTypeError extends MixEngineError {
  constructor(readonly contentType: string) {
    super("UnknownContentType", `No mood mapping for content type "${contentType}" and no default mood configured`);
  }
}

export class NoMatchingTrackError extends MixEngineError {
  constructor(readonly mood: string) {
    super("NoMatchingTrack", `Catalog has no tracks for mood "${mood}"`);
  }
}

export class InvalidDurationError extends MixEngineError {
  constructor(readonly durationSec: number, reason: string) {
    super("InvalidDuration", `Invalid target duration ${durationSec}s: ${reason}`);
  }
}

export class MalformedSpeechTimelineError extends MixEngineError {
  constructor(readonly index: number, readonly interval: SpeechInterval, reason: string) {
    super(
      "MalformedSpeechTimeline",
      `Speech interval #${index} (${interval.startSec}-${interval.endSec}) ${reason}`
    );
  }
}

export class RequestCancelledError extends MixEngineError {
  constructor(stage: string) {
    super("RequestCancelled", `Mix request cancelled before ${stage}`);
  }
}

export class CatalogError extends MixEngineError {
  constructor(message: string) {
    super("CatalogError", message);
  }
}

export class InvalidNarrationPathError extends MixEngineError {
  constructor(readonly requested: string, baseDir: string) {
    super("InvalidNarrationPath", `Narration file "${requested}" is outside ${baseDir}`);
  }
}

export function isMixEngineError(error: unknown): error is MixEngineError {
  return error instanceof MixEngineError;
}
