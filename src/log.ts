type LogLevel = "info" | "warn" | "error";

const SERVICE = "mood-mix-engine";

function write(level: LogLevel, event: string, data: Record<string, unknown>): void {
  const payload = {
    ts: new Date().toISOString(),
    level,
    service: SERVICE,
    event,
    ...data
  };
  const line = JSON.stringify(payload);
  if (level === "info") {
    console.log(line);
  } else {
    console.error(line);
  }
}

export function log(event: string, data: Record<string, unknown> = {}): void {
  write("info", event, data);
}

export function logWarn(event: string, data: Record<string, unknown> = {}): void {
  write("warn", event, data);
}

export function logError(event: string, error: unknown, data: Record<string, unknown> = {}): void {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof Error && "code" in error ? error.code : undefined;
  write("error", event, code === undefined ? { ...data, error: message } : { ...data, error: message, errorCode: code });
}
