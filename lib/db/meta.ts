// lib/db/meta.ts
import { withTransaction, type LiftLogDB } from "@/lib/db";
import type { Meta } from "@/lib/models/types";
import { HeightSchema, parseInput } from "@/lib/models/validation";

const EMPTY_META: Meta = { id: "app", heightCm: null, lastBackupAt: null };

/** 讀取 meta（沒有就回預設值，不寫入） */
export async function getMeta(db: LiftLogDB): Promise<Meta> {
  return (await db.get("meta", "app")) ?? EMPTY_META;
}

/** 合併 meta */
export async function setMeta(db: LiftLogDB, patch: Partial<Omit<Meta, "id">>): Promise<Meta> {
  return withTransaction(db, ["meta"], async (tx) => {
    const store = tx.objectStore("meta");
    const cur = (await store.get("app")) ?? EMPTY_META;
    const next: Meta = { ...cur, ...patch, id: "app" };
    await store.put(next);
    return next;
  });
}

/** 身高（cm），BMI 用 */
export async function setHeight(db: LiftLogDB, cm: number): Promise<Meta> {
  return setMeta(db, { heightCm: parseInput(HeightSchema, cm) });
}
