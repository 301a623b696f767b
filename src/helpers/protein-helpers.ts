import type { PoolClient } from "pg";
import { z } from "zod";
import { withTransaction } from "../db/transaction.js";
import { InvalidValueError } from "../errors.js";
import { getReferenceDate } from "./date-helpers.js";
import type { ProteinRecord, ProteinRecordRow } from "../db/types.js";

export const DEFAULT_DAILY_GOAL = 150;
/** Upper bound for both the goal and a day's intake, in grams. */
export const MAX_DAILY_PROTEIN = 500;

export const proteinUpdateSchema = z
  .object({
    goal: z.number().finite().optional(),
    intake_delta: z.number().finite().optional(),
  })
  .strict()
  .refine(b => b.goal !== undefined || b.intake_delta !== undefined, {
    message: "Provide goal and/or intake_delta",
  });

export type ProteinUpdate = z.infer<typeof proteinUpdateSchema>;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Zeroes the intake when the record was last touched on another calendar day.
 * Assigns rather than subtracts, so running it twice gives the same result.
 */
export function applyDailyReset(record: ProteinRecord, today: string): ProteinRecord {
  if (record.date === today) return record;
  return { ...record, current_intake: 0, date: today };
}

/** New intake after adding `delta`; negative results floor at zero. */
export function applyIntakeDelta(currentIntake: number, delta: number): number {
  if (!Number.isFinite(delta)) {
    throw new InvalidValueError("intake_delta must be a finite number");
  }
  const next = round2(Math.max(0, currentIntake + delta));
  if (next > MAX_DAILY_PROTEIN) {
    throw new InvalidValueError(`Today's protein cannot be greater than ${MAX_DAILY_PROTEIN}`);
  }
  return next;
}

export function validateGoal(goal: number): number {
  if (!Number.isFinite(goal) || goal <= 0) {
    throw new InvalidValueError("goal must be greater than 0");
  }
  if (goal > MAX_DAILY_PROTEIN) {
    throw new InvalidValueError(`goal cannot be greater than ${MAX_DAILY_PROTEIN}`);
  }
  return round2(goal);
}

function toRecord(row: ProteinRecordRow): ProteinRecord {
  return {
    goal: Number(row.daily_goal),
    current_intake: Number(row.current_intake),
    date: row.last_updated_date,
  };
}

async function lockRecord(client: PoolClient, userId: number, today: string): Promise<ProteinRecord> {
  // Created lazily on first access
  await client.query(
    `INSERT INTO protein_records (user_id, daily_goal, current_intake, last_updated_date)
     VALUES ($1, $2, 0, $3)
     ON CONFLICT (user_id) DO NOTHING`,
    [userId, DEFAULT_DAILY_GOAL, today]
  );
  const { rows } = await client.query<ProteinRecordRow>(
    `SELECT user_id, daily_goal, current_intake,
       to_char(last_updated_date, 'YYYY-MM-DD') AS last_updated_date
     FROM protein_records WHERE user_id = $1
     FOR UPDATE`,
    [userId]
  );
  if (rows.length === 0) {
    throw new Error(`Protein record for user ${userId} missing after insert`);
  }
  return toRecord(rows[0]);
}

/**
 * Loads the user's record under a row lock, applies the daily reset, lets
 * `mutate` change it, and writes back only if something differs.
 */
async function withProteinRecord(
  userId: number,
  mutate: (record: ProteinRecord) => ProteinRecord = (r) => r
): Promise<ProteinRecord> {
  const today = getReferenceDate();
  return withTransaction(async (client) => {
    const stored = await lockRecord(client, userId, today);
    const next = mutate(applyDailyReset(stored, today));

    if (
      next.goal !== stored.goal ||
      next.current_intake !== stored.current_intake ||
      next.date !== stored.date
    ) {
      await client.query(
        `UPDATE protein_records
         SET daily_goal = $2, current_intake = $3, last_updated_date = $4
         WHERE user_id = $1`,
        [userId, next.goal, next.current_intake, next.date]
      );
    }
    return next;
  });
}

/** Today's record, reset first if the stored day is not today. */
export async function getToday(userId: number): Promise<ProteinRecord> {
  return withProteinRecord(userId);
}

export async function updateIntake(userId: number, delta: number): Promise<ProteinRecord> {
  return withProteinRecord(userId, (r) => ({ ...r, current_intake: applyIntakeDelta(r.current_intake, delta) }));
}

export async function setGoal(userId: number, goal: number): Promise<ProteinRecord> {
  const validGoal = validateGoal(goal);
  return withProteinRecord(userId, (r) => ({ ...r, goal: validGoal }));
}

/** Goal and intake change applied together, in one transaction. */
export async function updateProtein(userId: number, update: ProteinUpdate): Promise<ProteinRecord> {
  const validGoal = update.goal === undefined ? undefined : validateGoal(update.goal);
  return withProteinRecord(userId, (r) => {
    let next = r;
    if (validGoal !== undefined) next = { ...next, goal: validGoal };
    if (update.intake_delta !== undefined) {
      next = { ...next, current_intake: applyIntakeDelta(next.current_intake, update.intake_delta) };
    }
    return next;
  });
}
