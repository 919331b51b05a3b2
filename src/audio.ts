import { randomUUID } from "node:crypto";
import path from "node:path";
import { InvalidNarrationPathError } from "./errors";
import { execCmd } from "./proc";

export async function getDurationSec(filePath: string): Promise<number> {
  const { stdout } = await execCmd("ffprobe", [
    "-v",
    "error",
    "-show_entries",
    "format=duration",
    "-of",
    "default=noprint_wrappers=1:nokey=1",
    filePath
  ]);

  const value = Number(stdout.trim());
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Could not read duration for ${filePath}`);
  }
  return value;
}

export function makeOutFile(workDir: string, prefix: string, ext = "wav"): string {
  return path.join(workDir, `${prefix}-${randomUUID()}.${ext}`);
}

/** Resolves `requested` against `baseDir`; anything that escapes the directory is rejected. */
export function resolveNarrationPath(baseDir: string, requested: string): string {
  const root = path.resolve(baseDir);
  const resolved = path.resolve(root, requested);
  const relative = path.relative(root, resolved);
  if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new InvalidNarrationPathError(requested, root);
  }
  return resolved;
}
