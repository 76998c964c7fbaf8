// lib/errors.ts
import type { ZodError } from "zod";

export type ErrorCode = "validation" | "store" | "not_found" | "import";

export class LiftLogError extends Error {
  code: ErrorCode;
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 使用者輸入不合法：寫入前就擋下，不會動到資料 */
export class ValidationError extends LiftLogError {
  issues: string[];
  constructor(issues: string[]) {
    super("validation", issues[0] ?? "Invalid input");
    this.issues = issues;
  }
}

export class StoreError extends LiftLogError {
  constructor(message: string, cause?: unknown) {
    super("store", message, { cause });
  }
}

export class NotFoundError extends LiftLogError {
  constructor(entity: string, id: string) {
    super("not_found", `${entity} not found: ${id}`);
  }
}

/** 匯入檔本身結構不對（整份拒收；單列錯誤只略過不丟錯） */
export class ImportError extends LiftLogError {
  constructor(message: string) {
    super("import", message);
  }
}

export function fromZodError(err: ZodError): ValidationError {
  return new ValidationError(
    err.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)),
  );
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
