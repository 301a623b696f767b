import type { Router } from "express";
import { z } from "zod";
import pool from "../db/connection.js";
import { getUserId } from "../context/user-context.js";
import { InvalidValueError, NotFoundError } from "../errors.js";
import { asyncRoute } from "../helpers/http-response.js";
import { parseBody, parseIdParam } from "../helpers/parse-helpers.js";
import { removeExercise } from "../helpers/workout-mode.js";
import type { Exercise, ExerciseRow, Workout, WorkoutRow, WorkoutWithExercises } from "../db/types.js";

const nameSchema = z.string().trim().min(1).max(30);
const countSchema = z.number().int().min(1).max(99);
const weightSchema = z.number().min(0).max(999.99);

const workoutCreateSchema = z.object({ name: nameSchema }).strict();

const exerciseCreateSchema = z
  .object({
    name: nameSchema,
    sets: countSchema,
    reps: countSchema,
    weight: weightSchema.optional(),
  })
  .strict();

/** Only the working weight and reps of an existing exercise may change. */
const EXERCISE_UPDATABLE: ReadonlySet<string> = new Set(["weight", "reps"]);

const exerciseUpdateSchema = z
  .object({
    weight: weightSchema.optional(),
    reps: countSchema.optional(),
  })
  .refine(b => b.weight !== undefined || b.reps !== undefined, {
    message: "Provide weight and/or reps",
  });

const WORKOUT_COLUMNS = "id, name, created_at, last_active_exercise_index, last_active_set_index, started_at";
const EXERCISE_COLUMNS = "id, workout_id, name, sets, reps, weight, sort_order";

export function toWorkout(row: Omit<WorkoutRow, "user_id">): Workout {
  const active = row.last_active_exercise_index != null && row.last_active_set_index != null;
  return {
    id: row.id,
    name: row.name,
    created_at: row.created_at,
    resume: active
      ? {
          exercise_index: Number(row.last_active_exercise_index),
          set_index: Number(row.last_active_set_index),
          started_at: row.started_at,
        }
      : null,
  };
}

export function toExercise(row: ExerciseRow): Exercise {
  return {
    id: row.id,
    workout_id: row.workout_id,
    name: row.name,
    sets: row.sets,
    reps: row.reps,
    weight: Number(row.weight),
  };
}

function rejectForbiddenFields(body: unknown): void {
  if (typeof body !== "object" || body === null) return;
  const forbidden = Object.keys(body).filter(k => !EXERCISE_UPDATABLE.has(k));
  if (forbidden.length > 0) {
    throw new InvalidValueError(forbidden.map(f => `${f}: This field cannot be updated.`).join(", "));
  }
}

async function assertWorkoutOwned(workoutId: number, userId: number): Promise<void> {
  const { rows } = await pool.query(
    "SELECT id FROM workouts WHERE id = $1 AND user_id = $2",
    [workoutId, userId]
  );
  if (rows.length === 0) {
    throw new NotFoundError("Workout not found");
  }
}

export function registerWorkoutRoutes(router: Router) {
  router.get("/workouts", asyncRoute(async (_req, res) => {
    const userId = getUserId();
    const { rows } = await pool.query<WorkoutRow>(
      `SELECT ${WORKOUT_COLUMNS} FROM workouts WHERE user_id = $1 ORDER BY id`,
      [userId]
    );
    res.json({ workouts: rows.map(toWorkout) });
  }));

  router.post("/workouts", asyncRoute(async (req, res) => {
    const userId = getUserId();
    const { name } = parseBody(workoutCreateSchema, req.body);
    const { rows: [row] } = await pool.query<WorkoutRow>(
      `INSERT INTO workouts (user_id, name) VALUES ($1, $2) RETURNING ${WORKOUT_COLUMNS}`,
      [userId, name]
    );
    res.status(201).json({ workout: toWorkout(row) });
  }));

  // Workout retrieval carries the resume pointer, so a client can pick
  // Workout Mode back up from here alone.
  router.get("/workouts/:workoutId", asyncRoute(async (req, res) => {
    const userId = getUserId();
    const workoutId = parseIdParam(req.params.workoutId, "Workout");

    const { rows } = await pool.query<WorkoutRow>(
      `SELECT ${WORKOUT_COLUMNS} FROM workouts WHERE id = $1 AND user_id = $2`,
      [workoutId, userId]
    );
    if (rows.length === 0) {
      throw new NotFoundError("Workout not found");
    }

    const { rows: exerciseRows } = await pool.query<ExerciseRow>(
      `SELECT ${EXERCISE_COLUMNS} FROM exercises WHERE workout_id = $1 ORDER BY sort_order, id`,
      [workoutId]
    );

    const workout: WorkoutWithExercises = { ...toWorkout(rows[0]), exercises: exerciseRows.map(toExercise) };
    res.json({ workout });
  }));

  router.delete("/workouts/:workoutId", asyncRoute(async (req, res) => {
    const userId = getUserId();
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    const { rowCount } = await pool.query(
      "DELETE FROM workouts WHERE id = $1 AND user_id = $2",
      [workoutId, userId]
    );
    if (!rowCount) {
      throw new NotFoundError("Workout not found");
    }
    res.status(204).end();
  }));

  // ─── Exercises ─────────────────────────────────────────────────────────

  router.get("/workouts/:workoutId/exercises", asyncRoute(async (req, res) => {
    const userId = getUserId();
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    await assertWorkoutOwned(workoutId, userId);

    const { rows } = await pool.query<ExerciseRow>(
      `SELECT ${EXERCISE_COLUMNS} FROM exercises WHERE workout_id = $1 ORDER BY sort_order, id`,
      [workoutId]
    );
    res.json({ exercises: rows.map(toExercise) });
  }));

  router.post("/workouts/:workoutId/exercises", asyncRoute(async (req, res) => {
    const userId = getUserId();
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    const input = parseBody(exerciseCreateSchema, req.body);

    // Appended at the end of the workout's sequence
    const { rows } = await pool.query<ExerciseRow>(
      `INSERT INTO exercises (workout_id, name, sets, reps, weight, sort_order)
       SELECT w.id, $3, $4, $5, $6,
         COALESCE((SELECT MAX(e.sort_order) + 1 FROM exercises e WHERE e.workout_id = w.id), 0)
       FROM workouts w
       WHERE w.id = $1 AND w.user_id = $2
       RETURNING ${EXERCISE_COLUMNS}`,
      [workoutId, userId, input.name, input.sets, input.reps, input.weight ?? 0]
    );
    if (rows.length === 0) {
      throw new NotFoundError("Workout not found");
    }
    res.status(201).json({ exercise: toExercise(rows[0]) });
  }));

  router.patch("/workouts/:workoutId/exercises/:exerciseId", asyncRoute(async (req, res) => {
    const userId = getUserId();
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    const exerciseId = parseIdParam(req.params.exerciseId, "Exercise");
    rejectForbiddenFields(req.body);
    const update = parseBody(exerciseUpdateSchema, req.body);

    await assertWorkoutOwned(workoutId, userId);

    const { rows } = await pool.query<ExerciseRow>(
      `UPDATE exercises
       SET weight = COALESCE($3, weight), reps = COALESCE($4, reps)
       WHERE id = $1 AND workout_id = $2
       RETURNING ${EXERCISE_COLUMNS}`,
      [exerciseId, workoutId, update.weight ?? null, update.reps ?? null]
    );
    if (rows.length === 0) {
      throw new NotFoundError("Exercise not found");
    }
    res.json({ exercise: toExercise(rows[0]) });
  }));

  router.delete("/workouts/:workoutId/exercises/:exerciseId", asyncRoute(async (req, res) => {
    const workoutId = parseIdParam(req.params.workoutId, "Workout");
    const exerciseId = parseIdParam(req.params.exerciseId, "Exercise");
    await removeExercise(workoutId, exerciseId, getUserId());
    res.status(204).end();
  }));
}
