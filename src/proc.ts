import { spawn } from "node:child_process";

export type ExecResult = {
  stdout: string;
  stderr: string;
};

export async function execCmd(
  bin: string,
  args: string[],
  opts?: { signal?: AbortSignal }
): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const p = spawn(bin, args, {
      signal: opts?.signal,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";

    p.stdout.on("data", (d) => {
      stdout += String(d);
    });

    p.stderr.on("data", (d) => {
      stderr += String(d);
    });

    p.on("error", reject);
    p.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      // ffmpeg prints its whole banner first; the tail carries the actual failure
      reject(new Error(`${bin} failed (${code}): ${stderr.slice(-2000)}`));
    });
  });
}
