import { describe, expect, it, vi } from "vitest";
import { EventEmitter } from "./event-emitter.js";

type TestEvents = {
  ping: [count: number];
  done: [];
};

describe("EventEmitter", () => {
  it("delivers typed arguments to every listener", () => {
    const emitter = new EventEmitter<TestEvents>();
    const first = vi.fn();
    const second = vi.fn();
    emitter.on("ping", first).on("ping", second);

    expect(emitter.emit("ping", 3)).toBe(true);
    expect(first).toHaveBeenCalledWith(3);
    expect(second).toHaveBeenCalledWith(3);
    expect(emitter.emit("done")).toBe(false);
  });

  it("removes listeners with off()", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on("ping", listener);
    emitter.off("ping", listener);

    emitter.emit("ping", 1);
    expect(listener).not.toHaveBeenCalled();
    expect(emitter.listenerCount("ping")).toBe(0);
  });

  it("runs once() listeners a single time", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.once("done", listener);

    emitter.emit("done");
    emitter.emit("done");
    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount("done")).toBe(0);
  });
});
