/**
 * Database row types.
 * NUMERIC columns arrive from pg as strings; mappers convert them with Number().
 */

// ─── User Tables ───────────────────────────────────────────────────────────

export interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  created_at: Date;
  last_login: Date | null;
}

export interface AuthTokenRow {
  token: string;
  user_id: number;
  expires_at: Date;
}

// ─── Workout Tables ────────────────────────────────────────────────────────

export interface WorkoutRow {
  id: number;
  user_id: number;
  name: string;
  last_active_exercise_index: number | null;
  last_active_set_index: number | null;
  started_at: Date | null;
  created_at: Date;
}

export interface ExerciseRow {
  id: number;
  workout_id: number;
  name: string;
  sets: number;
  reps: number;
  weight: string | number;
  sort_order: number;
}

// ─── Protein ───────────────────────────────────────────────────────────────

/** `last_updated_date` is selected through to_char(..., 'YYYY-MM-DD'). */
export interface ProteinRecordRow {
  user_id: number;
  daily_goal: string | number;
  current_intake: string | number;
  last_updated_date: string;
}

// ─── API Shapes ────────────────────────────────────────────────────────────

export interface Exercise {
  id: number;
  workout_id: number;
  name: string;
  sets: number;
  reps: number;
  weight: number;
}

export interface ResumePointer {
  exercise_index: number;
  set_index: number;
}

export interface Workout {
  id: number;
  name: string;
  created_at: Date;
  resume: (ResumePointer & { started_at: Date | null }) | null;
}

export interface WorkoutWithExercises extends Workout {
  exercises: Exercise[];
}

export interface ProteinRecord {
  goal: number;
  current_intake: number;
  date: string;
}
