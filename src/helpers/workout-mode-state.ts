import type { ResumePointer } from "../db/types.js";

export type AdvanceResult =
  | { kind: "moved"; pointer: ResumePointer; finishedExercise: number | null }
  | { kind: "complete"; finishedExercise: number | null };

/**
 * Brings a stored pointer back inside the workout's current shape.
 * An exercise whose remaining sets were removed counts as done, so the pointer
 * moves on to the next exercise's first set; past the end the session is over.
 */
export function clampPointer(setCounts: readonly number[], pointer: ResumePointer): ResumePointer | null {
  let exerciseIndex = Math.max(0, pointer.exercise_index);
  let setIndex = Math.max(0, pointer.set_index);

  while (exerciseIndex < setCounts.length && setIndex >= setCounts[exerciseIndex]) {
    exerciseIndex++;
    setIndex = 0;
  }
  if (exerciseIndex >= setCounts.length) return null;

  return { exercise_index: exerciseIndex, set_index: setIndex };
}

/**
 * Completes the set the pointer is on. `setCounts[i]` is the number of target
 * sets of the i-th exercise in workout order.
 */
export function advancePointer(setCounts: readonly number[], pointer: ResumePointer): AdvanceResult {
  const current = clampPointer(setCounts, pointer);
  if (!current) {
    return { kind: "complete", finishedExercise: null };
  }

  const { exercise_index, set_index } = current;
  if (set_index + 1 < setCounts[exercise_index]) {
    return { kind: "moved", pointer: { exercise_index, set_index: set_index + 1 }, finishedExercise: null };
  }

  const next = clampPointer(setCounts, { exercise_index: exercise_index + 1, set_index: 0 });
  if (!next) {
    return { kind: "complete", finishedExercise: exercise_index };
  }
  return { kind: "moved", pointer: next, finishedExercise: exercise_index };
}

/**
 * Pointer after the exercise at `removedIndex` is deleted.
 * Removing the current exercise resumes at the first set of the one that
 * slides into its place.
 */
export function pointerAfterExerciseRemoved(
  pointer: ResumePointer,
  removedIndex: number,
  remainingSetCounts: readonly number[]
): ResumePointer | null {
  if (removedIndex < pointer.exercise_index) {
    return clampPointer(remainingSetCounts, { exercise_index: pointer.exercise_index - 1, set_index: pointer.set_index });
  }
  if (removedIndex === pointer.exercise_index) {
    return clampPointer(remainingSetCounts, { exercise_index: pointer.exercise_index, set_index: 0 });
  }
  return clampPointer(remainingSetCounts, pointer);
}

export function samePointer(a: ResumePointer | null, b: ResumePointer | null): boolean {
  if (a === null || b === null) return a === b;
  return a.exercise_index === b.exercise_index && a.set_index === b.set_index;
}
