import type { SqliteDb } from "./db";

export type PlanRow = {
  id: number;
  title: string;
  price: number;
  // Negative means unlimited.
  duration_days: number;
  is_active: number;
};

export function listActivePlans(db: SqliteDb): PlanRow[] {
  return db.prepare<[], PlanRow>("SELECT * FROM plans WHERE is_active = 1 ORDER BY price ASC, id ASC").all();
}

export function getPlan(db: SqliteDb, planId: number): PlanRow | null {
  return db.prepare<[number], PlanRow>("SELECT * FROM plans WHERE id = ?").get(planId) ?? null;
}

export function createPlan(
  db: SqliteDb,
  input: { title: string; price: number; durationDays: number; isActive?: boolean }
): PlanRow {
  const result = db
    .prepare("INSERT INTO plans (title, price, duration_days, is_active) VALUES (?, ?, ?, ?)")
    .run(input.title, input.price, input.durationDays, input.isActive === false ? 0 : 1);
  const created = getPlan(db, Number(result.lastInsertRowid));
  if (!created) {
    throw new Error("Plan vanished right after insert");
  }
  return created;
}
