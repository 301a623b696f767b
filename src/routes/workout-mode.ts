import type { Router } from "express";
import { z } from "zod";
import { asyncRoute } from "../helpers/http-response.js";
import { parseBody, parseIdParam } from "../helpers/parse-helpers.js";
import { advance, beginSession, exitSession, getActiveSession, getResumeState } from "../helpers/workout-mode.js";

const advanceSchema = z
  .object({
    weight: z.number().min(0).max(999.99).optional(),
  })
  .strict();

export function registerWorkoutModeRoutes(router: Router) {
  router.get("/workout-mode", asyncRoute(async (_req, res) => {
    res.json(await getActiveSession());
  }));

  router.post("/workouts/:workoutId/session", asyncRoute(async (req, res) => {
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    res.status(201).json(await beginSession(workoutId));
  }));

  router.get("/workouts/:workoutId/session", asyncRoute(async (req, res) => {
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    res.json(await getResumeState(workoutId));
  }));

  router.post("/workouts/:workoutId/session/advance", asyncRoute(async (req, res) => {
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    const input = parseBody(advanceSchema, req.body);
    res.json(await advance(workoutId, input));
  }));

  router.delete("/workouts/:workoutId/session", asyncRoute(async (req, res) => {
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    await exitSession(workoutId);
    res.status(204).end();
  }));
}
