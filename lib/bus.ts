// lib/bus.ts

export type DataCollection = "exercises" | "workouts" | "sets" | "goals" | "bodyStats" | "bodyGoals" | "all";
export type DataChange = { collection: DataCollection };

type Handler = (change: DataChange) => void;

let dataHandlers: Handler[] = [];

export function onDataChanged(handler: Handler) {
  dataHandlers.push(handler);
}

export function offDataChanged(handler: Handler) {
  dataHandlers = dataHandlers.filter((h) => h !== handler);
}

export function emitDataChanged(collection: DataCollection) {
  const change: DataChange = { collection };
  for (const h of dataHandlers) {
    try {
      h(change);
    } catch (e) {
      console.error("[bus] error in data-changed handler", e);
    }
  }
}
