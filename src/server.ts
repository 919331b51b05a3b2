import express, { type Request, type Response } from "express";
import { mkdir } from "node:fs/promises";
import { createServer } from "node:http";
import { WebSocketServer } from "ws";
import { z } from "zod";
import { getDurationSec, makeOutFile, resolveNarrationPath } from "./audio";
import { loadCatalog, scanCatalogDir, validateTrackFiles, type TrackCatalog } from "./catalog";
import { appConfig } from "./config";
import { isMixEngineError, type MixErrorCode } from "./errors";
import { loadLibraryConfig } from "./library";
import { log, logError, logWarn } from "./log";
import { MixEngine } from "./mix-engine";
import { createRng } from "./random";
import { formatSseEvent, formatSseSnapshot, heartbeatSseEvent } from "./sse";
import { renderMixPlan } from "./timeline";
import { MOOD_CATEGORIES, type EngineEvent } from "./types";

const speechSchema = z.array(z.object({ startSec: z.number(), endSec: z.number() }));

const mixRequestSchema = z.object({
  contentType: z.string().min(1).optional(),
  mood: z.enum(MOOD_CATEGORIES).optional(),
  emotionalContext: z.string().min(1).optional(),
  targetDurationSec: z.number(),
  speech: speechSchema.default([])
});

const renderRequestSchema = mixRequestSchema.extend({
  narrationFile: z.string().min(1).optional()
});

const STATUS_BY_CODE: Record<MixErrorCode, number> = {
  InvalidDuration: 400,
  MalformedSpeechTimeline: 400,
  UnknownContentType: 422,
  NoMatchingTrack: 409,
  RequestCancelled: 499,
  CatalogError: 500,
  InvalidNarrationPath: 400
};

function sendError(res: Response, error: unknown): void {
  if (isMixEngineError(error)) {
    res.status(STATUS_BY_CODE[error.code]).json({ ok: false, code: error.code, error: error.message });
    return;
  }
  res.status(500).json({ ok: false, code: "Internal", error: String(error) });
}

function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

async function loadTracks(): Promise<TrackCatalog> {
  const catalog = appConfig.catalogDir
    ? await scanCatalogDir(appConfig.catalogDir)
    : await loadCatalog(appConfig.catalogPath);
  return appConfig.validateTrackFiles ? validateTrackFiles(catalog) : catalog;
}

async function bootstrap(): Promise<void> {
  await mkdir(appConfig.workDir, { recursive: true });
  const loaded = await loadLibraryConfig(appConfig.libraryConfigPath);
  const library = { ...loaded, defaultMood: appConfig.defaultMood ?? loaded.defaultMood };
  const catalog = await loadTracks();
  const engine = new MixEngine(catalog, library, {
    recencyWindow: appConfig.recencyWindow,
    random: appConfig.selectionSeed === null ? undefined : createRng(appConfig.selectionSeed),
    loopTrim: {
      crossfadeSec: appConfig.crossfadeSec,
      fadeInSec: appConfig.fadeInSec,
      fadeOutSec: appConfig.fadeOutSec,
      curve: appConfig.crossfadeCurve
    },
    ducking: { transitionSec: appConfig.duckTransitionSec }
  });
  const runtime = engine.getRuntimeState();

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  const httpServer = createServer(app);
  const wsServer = new WebSocketServer({ server: httpServer, path: "/ws" });

  runtime.subscribe((event: EngineEvent) => {
    const payload = JSON.stringify({ type: "event", event });
    for (const client of wsServer.clients) {
      if (client.readyState === 1) {
        client.send(payload);
      }
    }
  });

  wsServer.on("connection", (socket) => {
    socket.send(JSON.stringify({ type: "snapshot", snapshot: runtime.snapshot() }));
  });

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, service: "mood-mix-engine", tracks: catalog.size });
  });

  app.get("/status", (_req, res) => {
    res.json(runtime.snapshot());
  });

  app.get("/catalog", (_req, res) => {
    res.json({ tracks: catalog.all(), byMood: catalog.countsByMood() });
  });

  app.get("/moods", (_req, res) => {
    res.json(library.profiles);
  });

  app.get("/moods/:contentType/suggestions", (req, res) => {
    try {
      res.json(engine.suggest(req.params.contentType));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/mix/plan", async (req: Request, res: Response) => {
    const parsed = mixRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, code: "BadRequest", error: parsed.error.issues.map((i) => i.message).join("; ") });
      return;
    }
    try {
      const plan = await engine.plan({ ...parsed.data, signal: abortOnDisconnect(res) });
      res.json({ ok: true, plan });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/mix/render", async (req: Request, res: Response) => {
    const parsed = renderRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, code: "BadRequest", error: parsed.error.issues.map((i) => i.message).join("; ") });
      return;
    }
    const { narrationFile, ...request } = parsed.data;
    const signal = abortOnDisconnect(res);
    try {
      const narrationPath = narrationFile ? resolveNarrationPath(appConfig.narrationDir, narrationFile) : undefined;
      const plan = await engine.plan({ ...request, signal });
      if (narrationPath) {
        const narrationSec = await getDurationSec(narrationPath);
        if (narrationSec > plan.durationSec) {
          logWarn("mix.render.narration_longer_than_plan", { requestId: plan.id, narrationSec, planSec: plan.durationSec });
        }
      }
      const outFile = makeOutFile(appConfig.workDir, `mix-${plan.mood}`);
      await renderMixPlan(plan, outFile, { narrationFile: narrationPath, masterLufs: appConfig.masterLufs, signal });
      runtime.mixRendered(plan.id, outFile);
      res.json({ ok: true, plan, outFile });
    } catch (error) {
      logError("mix.render.error", error);
      sendError(res, error);
    }
  });

  app.get("/events", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders?.();
    res.write(formatSseSnapshot(runtime.snapshot()));

    const unsubscribe = runtime.subscribe((event) => {
      res.write(formatSseEvent(event));
    });
    const heartbeat = setInterval(() => {
      res.write(heartbeatSseEvent());
    }, 15000);

    req.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
      res.end();
    });
  });

  httpServer.listen(appConfig.port, () => {
    log("server.listen", { port: appConfig.port, tracks: catalog.size });
  });

  const shutdown = () => {
    wsServer.close();
    httpServer.close(() => process.exit(0));
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

bootstrap().catch((error) => {
  logError("server.bootstrap.error", error);
  process.exit(1);
});
