import type { EngineEvent, EngineSnapshot } from "./types";

let sequence = 0;

function frame(event: string, data: unknown): string {
  sequence += 1;
  return `id: ${sequence}\nretry: 2000\nevent: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function formatSseEvent(event: EngineEvent): string {
  return frame("message", event);
}

export function formatSseSnapshot(snapshot: EngineSnapshot): string {
  return frame("snapshot", snapshot);
}

export function heartbeatSseEvent(): string {
  return frame("heartbeat", { ts: new Date().toISOString() });
}
