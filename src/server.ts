// Donation Sorter - Express Server and WebSocket Broadcast
//
// Read-only views over the donation log and pipeline status, the live MJPEG
// preview, and the manual capture trigger. Pipeline snapshots are pushed to
// every WebSocket client as they are published.

import express, { type Express, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { WebSocketServer, WebSocket } from "ws";
import type { DonationRecord, DonationStats, ServerMessage } from "./types.js";
import type { SnapshotPublisher } from "./snapshot-publisher.js";
import type { TriggerResult } from "./pipeline-controller.js";
import type { JpegListener } from "./live-feed.js";
import { DEFAULT_RECENT_LIMIT } from "./donation-log.js";
import { createConsoleLogger, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const STREAM_BOUNDARY = "frame";

const TRIGGER_REJECTIONS = {
  busy: { status: 409, error: "Capture already in progress" },
  no_frame: { status: 503, error: "No camera frame available" },
  warming_up: { status: 503, error: "Camera is warming up" },
  stopped: { status: 503, error: "Pipeline is not running" },
} as const;

// ─── Collaborators ──────────────────────────────────────────────────────────────

export interface DonationQueries {
  getAll(): DonationRecord[];
  getRecent(limit?: number): DonationRecord[];
  getStats(): DonationStats;
}

export interface CaptureTrigger {
  trigger(): TriggerResult;
}

export interface PreviewSource {
  latestJpeg(): Buffer | null;
  subscribe(listener: JpegListener): () => void;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  donations: DonationQueries;
  publisher: SnapshotPublisher;
  trigger: CaptureTrigger;
  preview: PreviewSource;
  /** Directory to serve static files from. Defaults to "public" relative to cwd. */
  staticDir?: string;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Port actually bound, once listening. */
  port(): number | null;
  /** Close every open connection, then the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    donations,
    publisher,
    trigger,
    preview,
    staticDir = path.resolve(process.cwd(), "public"),
    logger = createConsoleLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);
  const streams = new Set<Response>();

  // The dashboard may be served from another origin.
  app.use((_req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    next();
  });

  app.use(express.static(staticDir));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ─── Donation log ─────────────────────────────────────────────────────────────

  app.get("/donations", (_req, res) => {
    res.json(donations.getAll());
  });

  app.get("/donations/recent", (req, res) => {
    res.json(donations.getRecent(parseLimit(req.query.limit)));
  });

  app.get("/stats", (_req, res) => {
    res.json(donations.getStats());
  });

  // ─── Pipeline ─────────────────────────────────────────────────────────────────

  app.get("/pipeline/state", (_req, res) => {
    res.json(publisher.read());
  });

  app.get("/pipeline/frame", (_req, res) => {
    const jpeg = preview.latestJpeg();
    if (!jpeg) {
      res.status(404).json({ error: "No frame available" });
      return;
    }
    res.setHeader("Cache-Control", "no-store");
    res.type("image/jpeg").send(jpeg);
  });

  app.get("/pipeline/stream", (_req, res) => {
    openStream(res, preview, streams);
  });

  app.post("/pipeline/capture", (_req, res) => {
    const result = trigger.trigger();
    if (result.accepted) {
      logger.info(`Manual capture accepted as cycle ${result.cycleId}`);
      res.status(202).json({ accepted: true, cycleId: result.cycleId });
      return;
    }
    const rejection = TRIGGER_REJECTIONS[result.reason];
    logger.warn(`Manual capture rejected: ${result.reason}`);
    res.status(rejection.status).json({ accepted: false, reason: result.reason, error: rejection.error });
  });

  // ─── WebSocket ────────────────────────────────────────────────────────────────

  const wss = new WebSocketServer({ server: httpServer });

  // ws re-emits HTTP server errors here; listen() reports them to the caller.
  wss.on("error", (err: Error) => {
    logger.error(`WebSocket server error: ${err.message}`);
  });

  wss.on("connection", (ws: WebSocket) => {
    logger.info(`WebSocket connected (${wss.clients.size} open)`);
    sendMessage(ws, { type: "pipeline_state", snapshot: publisher.read() });

    // A malformed frame from one client must not take the process down.
    ws.on("error", (err: Error) => {
      logger.warn(`WebSocket error: ${err.message}`);
      ws.terminate();
    });

    ws.on("message", () => {
      sendMessage(ws, { type: "error", message: "This socket only sends pipeline updates" });
    });

    ws.on("close", () => {
      logger.info(`WebSocket closed (${wss.clients.size} open)`);
    });
  });

  const boundPort = (): number | null => {
    const address = httpServer.address();
    return address && typeof address === "object" ? address.port : null;
  };

  const unsubscribe = publisher.subscribe((snapshot) => {
    const message: ServerMessage = { type: "pipeline_state", snapshot };
    for (const client of wss.clients) {
      sendMessage(client, message);
    }
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        const onError = (err: Error) => {
          reject(err);
        };
        httpServer.once("error", onError);
        httpServer.listen(port, () => {
          httpServer.off("error", onError);
          logger.info(`Server listening on port ${boundPort() ?? port}`);
          resolve();
        });
      });
    },
    port: boundPort,
    close(): Promise<void> {
      unsubscribe();
      for (const res of streams) {
        res.end();
      }
      streams.clear();
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** Positive integer from the query string; anything else means the default. */
export function parseLimit(raw: unknown): number {
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) return DEFAULT_RECENT_LIMIT;
  const limit = Number(raw);
  return limit > 0 ? limit : DEFAULT_RECENT_LIMIT;
}

export function encodeStreamPart(jpeg: Buffer): Buffer {
  return Buffer.concat([
    Buffer.from(`--${STREAM_BOUNDARY}\r\nContent-Type: image/jpeg\r\nContent-Length: ${jpeg.length}\r\n\r\n`),
    jpeg,
    Buffer.from("\r\n"),
  ]);
}

/**
 * MJPEG over multipart/x-mixed-replace. Each preview JPEG is pushed as it is
 * encoded; a client that has not drained the previous part skips frames.
 */
function openStream(res: Response, preview: PreviewSource, streams: Set<Response>): void {
  res.writeHead(200, {
    "Content-Type": `multipart/x-mixed-replace; boundary=${STREAM_BOUNDARY}`,
    "Cache-Control": "no-store",
    Connection: "close",
  });
  res.flushHeaders();
  streams.add(res);

  const push: JpegListener = (jpeg) => {
    if (!res.writableNeedDrain) res.write(encodeStreamPart(jpeg));
  };

  const current = preview.latestJpeg();
  if (current) push(current);
  const unsubscribe = preview.subscribe(push);

  res.on("close", () => {
    unsubscribe();
    streams.delete(res);
  });
}

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
