import type { PoolClient } from "pg";
import pool from "../db/connection.js";
import { withTransaction } from "../db/transaction.js";
import { getUserId } from "../context/user-context.js";
import { InvalidValueError, NoSuchStateError, NotFoundError } from "../errors.js";
import type { ResumePointer } from "../db/types.js";
import { advancePointer, pointerAfterExerciseRemoved, samePointer } from "./workout-mode-state.js";

export interface ResumeState extends ResumePointer {
  active: true;
  workout_id: number;
  /** Null only for a session on a workout without exercises. */
  exercise_id: number | null;
  started_at: Date | null;
}

export interface ActiveSession extends ResumeState {
  workout_name: string;
}

/** Valid empty state: the workout exists but nothing is in progress. */
export const NO_ACTIVE_SESSION = Object.freeze({ active: false as const });
export type NoActiveSession = typeof NO_ACTIVE_SESSION;

export type AdvanceOutcome =
  | ({ status: "active" } & ResumeState)
  | { status: "complete"; workout_id: number; finished_exercise_id: number | null };

interface LockedWorkout {
  id: number;
  last_active_exercise_index: number | null;
  last_active_set_index: number | null;
  started_at: Date | null;
}

interface OrderedExercise {
  id: number;
  sets: number;
}

function storedPointer(row: LockedWorkout): ResumePointer | null {
  if (row.last_active_exercise_index == null || row.last_active_set_index == null) return null;
  return { exercise_index: row.last_active_exercise_index, set_index: row.last_active_set_index };
}

async function lockWorkout(client: PoolClient, workoutId: number, userId: number): Promise<LockedWorkout> {
  const { rows } = await client.query<LockedWorkout>(
    `SELECT id, last_active_exercise_index, last_active_set_index, started_at
     FROM workouts WHERE id = $1 AND user_id = $2
     FOR UPDATE`,
    [workoutId, userId]
  );
  if (rows.length === 0) {
    throw new NotFoundError("Workout not found");
  }
  return rows[0];
}

async function loadExercises(client: PoolClient, workoutId: number): Promise<OrderedExercise[]> {
  const { rows } = await client.query<OrderedExercise>(
    "SELECT id, sets FROM exercises WHERE workout_id = $1 ORDER BY sort_order, id",
    [workoutId]
  );
  return rows;
}

async function savePointer(client: PoolClient, workoutId: number, pointer: ResumePointer | null): Promise<void> {
  if (pointer) {
    await client.query(
      "UPDATE workouts SET last_active_exercise_index = $2, last_active_set_index = $3 WHERE id = $1",
      [workoutId, pointer.exercise_index, pointer.set_index]
    );
  } else {
    await client.query(
      "UPDATE workouts SET last_active_exercise_index = NULL, last_active_set_index = NULL, started_at = NULL WHERE id = $1",
      [workoutId]
    );
  }
}

/**
 * Starts (or restarts) Workout Mode on a workout at its first set.
 */
export async function beginSession(workoutId: number, userId: number = getUserId()): Promise<ResumeState> {
  return withTransaction(async (client) => {
    await lockWorkout(client, workoutId, userId);
    const exercises = await loadExercises(client, workoutId);

    const { rows: [updated] } = await client.query<{ started_at: Date }>(
      `UPDATE workouts
       SET last_active_exercise_index = 0, last_active_set_index = 0, started_at = NOW()
       WHERE id = $1
       RETURNING started_at`,
      [workoutId]
    );

    return {
      active: true,
      workout_id: workoutId,
      exercise_index: 0,
      set_index: 0,
      exercise_id: exercises[0]?.id ?? null,
      started_at: updated.started_at,
    };
  });
}

/**
 * Marks the current set as done and persists the next resume point in the
 * same transaction. `weight` is only accepted together with the last set of
 * an exercise and becomes that exercise's working weight.
 */
export async function advance(
  workoutId: number,
  input: { weight?: number } = {},
  userId: number = getUserId()
): Promise<AdvanceOutcome> {
  return withTransaction(async (client) => {
    const workout = await lockWorkout(client, workoutId, userId);
    const pointer = storedPointer(workout);
    if (!pointer) {
      throw new NoSuchStateError("No active session for this workout");
    }

    const exercises = await loadExercises(client, workoutId);
    const result = advancePointer(exercises.map(e => e.sets), pointer);
    const finished = result.finishedExercise === null ? null : exercises[result.finishedExercise];

    if (input.weight !== undefined) {
      if (!finished) {
        throw new InvalidValueError("weight can only be set when completing the last set of an exercise");
      }
      await client.query("UPDATE exercises SET weight = $2 WHERE id = $1", [finished.id, input.weight]);
    }

    if (result.kind === "complete") {
      await savePointer(client, workoutId, null);
      return { status: "complete", workout_id: workoutId, finished_exercise_id: finished?.id ?? null };
    }

    await savePointer(client, workoutId, result.pointer);
    return {
      status: "active",
      active: true,
      workout_id: workoutId,
      ...result.pointer,
      exercise_id: exercises[result.pointer.exercise_index].id,
      started_at: workout.started_at,
    };
  });
}

/**
 * Reads the persisted resume point from the workout row alone.
 */
export async function getResumeState(
  workoutId: number,
  userId: number = getUserId()
): Promise<ResumeState | NoActiveSession> {
  const { rows } = await pool.query<LockedWorkout & { exercise_id: number | null }>(
    `SELECT w.id, w.last_active_exercise_index, w.last_active_set_index, w.started_at,
       (SELECT e.id FROM exercises e WHERE e.workout_id = w.id
        ORDER BY e.sort_order, e.id
        OFFSET w.last_active_exercise_index LIMIT 1) AS exercise_id
     FROM workouts w
     WHERE w.id = $1 AND w.user_id = $2`,
    [workoutId, userId]
  );
  if (rows.length === 0) {
    throw new NotFoundError("Workout not found");
  }

  const row = rows[0];
  const pointer = storedPointer(row);
  if (!pointer) return NO_ACTIVE_SESSION;

  return {
    active: true,
    workout_id: row.id,
    ...pointer,
    exercise_id: row.exercise_id,
    started_at: row.started_at,
  };
}

/** Explicit exit. Clearing an already idle workout is a no-op. */
export async function exitSession(workoutId: number, userId: number = getUserId()): Promise<void> {
  const { rowCount } = await pool.query(
    `UPDATE workouts
     SET last_active_exercise_index = NULL, last_active_set_index = NULL, started_at = NULL
     WHERE id = $1 AND user_id = $2`,
    [workoutId, userId]
  );
  if (!rowCount) {
    throw new NotFoundError("Workout not found");
  }
}

/**
 * The user's in-progress workout, if any. With several (a client may leave
 * one running and start another) the most recently started one wins.
 */
export async function getActiveSession(userId: number = getUserId()): Promise<ActiveSession | NoActiveSession> {
  const { rows } = await pool.query<LockedWorkout & { name: string; exercise_id: number | null }>(
    `SELECT w.id, w.name, w.last_active_exercise_index, w.last_active_set_index, w.started_at,
       (SELECT e.id FROM exercises e WHERE e.workout_id = w.id
        ORDER BY e.sort_order, e.id
        OFFSET w.last_active_exercise_index LIMIT 1) AS exercise_id
     FROM workouts w
     WHERE w.user_id = $1 AND w.last_active_exercise_index IS NOT NULL
     ORDER BY w.started_at DESC NULLS LAST, w.id DESC
     LIMIT 1`,
    [userId]
  );
  if (rows.length === 0) return NO_ACTIVE_SESSION;

  const row = rows[0];
  const pointer = storedPointer(row);
  if (!pointer) return NO_ACTIVE_SESSION;

  return {
    active: true,
    workout_id: row.id,
    workout_name: row.name,
    ...pointer,
    exercise_id: row.exercise_id,
    started_at: row.started_at,
  };
}

/**
 * Deletes an exercise and re-targets the workout's resume pointer so it never
 * references an exercise that no longer exists.
 */
export async function removeExercise(
  workoutId: number,
  exerciseId: number,
  userId: number = getUserId()
): Promise<{ resume: ResumePointer | null }> {
  return withTransaction(async (client) => {
    const workout = await lockWorkout(client, workoutId, userId);
    const exercises = await loadExercises(client, workoutId);

    const removedIndex = exercises.findIndex(e => e.id === exerciseId);
    if (removedIndex === -1) {
      throw new NotFoundError("Exercise not found");
    }

    await client.query("DELETE FROM exercises WHERE id = $1 AND workout_id = $2", [exerciseId, workoutId]);

    const pointer = storedPointer(workout);
    if (!pointer) return { resume: null };

    const remaining = exercises.filter(e => e.id !== exerciseId).map(e => e.sets);
    const next = pointerAfterExerciseRemoved(pointer, removedIndex, remaining);
    if (!samePointer(pointer, next)) {
      await savePointer(client, workoutId, next);
    }
    return { resume: next };
  });
}
