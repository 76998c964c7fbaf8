// lib/tasks.ts
// 背景計算的結果以訊息送回，由使用端（UI）自己套用
import { toError } from "@/lib/errors";
import { safeUUID } from "@/lib/utils/uuid";

export type TaskMessage<T> = { id: string; ok: true; value: T } | { id: string; ok: false; error: Error };

export type TaskChannel<T> = {
  /** 開始一個計算，回傳 id */
  submit: (task: () => Promise<T>) => string;
  /** 下一則訊息（完成順序） */
  receive: () => Promise<TaskMessage<T>>;
  /** 已到的訊息全部取出，不等待 */
  drain: () => TaskMessage<T>[];
  /** 還沒完成的數量 */
  pending: () => number;
};

export function createTaskChannel<T>(): TaskChannel<T> {
  const queue: TaskMessage<T>[] = [];
  const waiters: ((m: TaskMessage<T>) => void)[] = [];
  let running = 0;

  const deliver = (m: TaskMessage<T>) => {
    running--;
    const w = waiters.shift();
    if (w) w(m);
    else queue.push(m);
  };

  return {
    submit(task) {
      const id = safeUUID();
      running++;
      void Promise.resolve()
        .then(task)
        .then(
          (value) => deliver({ id, ok: true, value }),
          (e: unknown) => {
            console.warn("[tasks] task failed", id, e);
            deliver({ id, ok: false, error: toError(e) });
          },
        );
      return id;
    },
    receive() {
      const m = queue.shift();
      if (m) return Promise.resolve(m);
      return new Promise((resolve) => waiters.push(resolve));
    },
    drain() {
      return queue.splice(0, queue.length);
    },
    pending() {
      return running;
    },
  };
}
