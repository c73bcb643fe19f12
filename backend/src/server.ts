/**
 * Hono server configuration for Study Loop
 *
 * Provides:
 * - Health check endpoint at /api/health
 * - Note, schedule and stats endpoints under /api
 * - CORS headers for local development
 */

import { serve, type ServerType } from "@hono/node-server";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { restErrorHandler } from "./middleware/error-handler.js";
import { type AppEnv, serviceContext } from "./middleware/service-context.js";
import { apiRoutes } from "./routes/index.js";
import { NoteStore } from "./notes/note-storage.js";
import { SessionHistoryLog } from "./history/session-history.js";
import { ReviewService } from "./review-service.js";
import type { StudyConfig } from "./study-config.js";
import { serverLog as log } from "./logger.js";

/**
 * Build the review service over the configured directories.
 */
export const createReviewService = (
  config: Pick<
    StudyConfig,
    "notesDir" | "historyDir" | "defaultSchedulePattern" | "weakQuestionLimit"
  >,
  clock?: () => Date
): ReviewService => {
  return new ReviewService(new NoteStore(config.notesDir), new SessionHistoryLog(config.historyDir), {
    defaultSchedulePattern: config.defaultSchedulePattern,
    weakQuestionLimit: config.weakQuestionLimit,
    clock,
  });
};

/**
 * Create and configure the Hono application
 */
export const createApp = (service: ReviewService) => {
  const app = new Hono<AppEnv>();

  app.use(
    "/api/*",
    cors({
      origin: ["http://localhost:5173", "http://localhost:3000"],
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    })
  );

  app.use("/api/*", serviceContext(service));

  // Health check endpoint
  app.get("/api/health", (c) => {
    return c.text("Study Loop Backend");
  });

  app.route("/api", apiRoutes);

  app.onError(restErrorHandler);

  return app;
};

export interface RunningServer {
  server: ServerType;
  /** Bound port; differs from the configured one when that was 0 */
  port: number;
}

/**
 * Create the notes directory and start listening.
 * Resolves once the server is bound.
 */
export async function startServer(config: StudyConfig): Promise<RunningServer> {
  await new NoteStore(config.notesDir).ensureNotesDir();
  const app = createApp(createReviewService(config));

  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
      log.info(`Study Loop Backend running at http://${config.host}:${info.port}`);
      log.info(`Notes: ${config.notesDir}`);
      log.info(`History: ${config.historyDir}`);
      resolve({ server, port: info.port });
    });
    server.once("error", reject);
  });
}
