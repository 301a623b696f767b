import express, { Router } from "express";
import cors from "cors";
import config from "./config.js";
import { requireAuth } from "./auth/middleware.js";
import { errorHandler, notFoundHandler } from "./helpers/http-response.js";
import { registerAuthRoutes } from "./routes/auth.js";
import { registerWorkoutRoutes } from "./routes/workouts.js";
import { registerWorkoutModeRoutes } from "./routes/workout-mode.js";
import { registerProteinRoutes } from "./routes/protein.js";

const AUTHENTICATED_PREFIXES = ["/workouts", "/workout-mode", "/protein"];

export function createApp() {
  const app = express();
  // Behind one load balancer hop, so req.ip is the real client (rate limiting)
  app.set("trust proxy", 1);
  app.use(cors({
    origin: config.allowedOrigins,
    methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  }));
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Public: account creation and token issuance
  const publicRouter = Router();
  registerAuthRoutes(publicRouter);
  app.use(publicRouter);

  // Scoped to the authenticated user. Auth runs only under these prefixes so
  // an unmatched path still falls through to the 404 handler.
  const api = Router();
  api.use(AUTHENTICATED_PREFIXES, requireAuth);
  registerWorkoutRoutes(api);
  registerWorkoutModeRoutes(api);
  registerProteinRoutes(api);
  app.use(api);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
