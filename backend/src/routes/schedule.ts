/**
 * Schedule Routes
 *
 * - POST /schedule/preview - Next review for given scheduling fields,
 *   without touching any note
 * - GET /stats - Collection statistics
 */

import { Hono } from "hono";
import { CalculateNextReviewRequestSchema } from "@study-loop/shared";
import { type AppEnv, getServiceFromContext, readJsonBody } from "../middleware/service-context.js";

const scheduleRoutes = new Hono<AppEnv>();

scheduleRoutes.post("/schedule/preview", async (c) => {
  const request = await readJsonBody(c, CalculateNextReviewRequestSchema);
  return c.json(getServiceFromContext(c).calculateNextReview(request));
});

scheduleRoutes.get("/stats", async (c) => {
  const stats = await getServiceFromContext(c).getStats();
  return c.json(stats);
});

export { scheduleRoutes };
