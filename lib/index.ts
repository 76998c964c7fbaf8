// lib/index.ts
export * from "@/lib/config";
export * from "@/lib/errors";
export * from "@/lib/bus";
export * from "@/lib/tasks";
export * from "@/lib/models/types";
export * from "@/lib/models/validation";
export * from "@/lib/models/backup";
export * from "@/lib/db";
export * from "@/lib/db/body";
export * from "@/lib/db/history";
export * from "@/lib/db/meta";
export * from "@/lib/db/migrate";
export * from "@/lib/goals";
export * from "@/lib/stats";
export * from "@/lib/export/text";
export * from "@/lib/export/backup";
export * from "@/lib/import/csv";
