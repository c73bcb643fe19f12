/**
 * Route Index
 *
 * Registers all REST routes under `/api`. The service context middleware
 * must run first so handlers can reach the review service.
 */

import { Hono } from "hono";
import type { AppEnv } from "../middleware/service-context.js";
import { noteRoutes } from "./notes.js";
import { scheduleRoutes } from "./schedule.js";

/**
 * Usage in server.ts:
 * ```typescript
 * app.route("/api", apiRoutes);
 * ```
 */
const apiRoutes = new Hono<AppEnv>();

apiRoutes.route("/notes", noteRoutes);
apiRoutes.route("/", scheduleRoutes);

export { apiRoutes };
