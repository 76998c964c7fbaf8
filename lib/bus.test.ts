import { afterEach, describe, expect, it, vi } from "vitest";
import { emitDataChanged, offDataChanged, onDataChanged, type DataChange } from "@/lib/bus";

describe("data-changed bus", () => {
  const handlers: ((c: DataChange) => void)[] = [];
  const listen = (h: (c: DataChange) => void) => {
    handlers.push(h);
    onDataChanged(h);
  };

  afterEach(() => {
    handlers.splice(0).forEach(offDataChanged);
    vi.restoreAllMocks();
  });

  it("delivers the changed collection", () => {
    const h = vi.fn();
    listen(h);
    emitDataChanged("sets");
    expect(h).toHaveBeenCalledWith({ collection: "sets" });
  });

  it("keeps notifying after a handler throws", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const after = vi.fn();
    listen(() => {
      throw new Error("handler failed");
    });
    listen(after);
    emitDataChanged("goals");
    expect(after).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("stops delivering after off", () => {
    const h = vi.fn();
    onDataChanged(h);
    offDataChanged(h);
    emitDataChanged("all");
    expect(h).not.toHaveBeenCalled();
  });
});
