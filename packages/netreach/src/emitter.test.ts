import { describe, it, expect, vi } from "vitest";
import { emitter } from "./emitter";

describe("emitter", () => {
  describe("basic functionality", () => {
    it("should add and call listeners", () => {
      const eventEmitter = emitter<string>();
      const listener = vi.fn();

      eventEmitter.on(listener);
      eventEmitter.emit("test");

      expect(listener).toHaveBeenCalledWith("test");
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it("should call listeners in order", () => {
      const eventEmitter = emitter<string>();
      const callOrder: string[] = [];

      eventEmitter.on(() => callOrder.push("first"));
      eventEmitter.on(() => callOrder.push("second"));
      eventEmitter.on(() => callOrder.push("third"));

      eventEmitter.emit("test");

      expect(callOrder).toEqual(["first", "second", "third"]);
    });

    it("should prevent duplicate listeners (same function added twice)", () => {
      const eventEmitter = emitter<string>();
      const listener = vi.fn();

      eventEmitter.on(listener);
      eventEmitter.on(listener);

      eventEmitter.emit("test");

      expect(listener).toHaveBeenCalledTimes(1);
      expect(eventEmitter.size).toBe(1);
    });

    it("should accept an array of listeners", () => {
      const eventEmitter = emitter<number>();
      const listener1 = vi.fn();
      const listener2 = vi.fn();

      const unsubscribe = eventEmitter.on([listener1, listener2]);
      eventEmitter.emit(7);
      unsubscribe();
      eventEmitter.emit(8);

      expect(listener1).toHaveBeenCalledTimes(1);
      expect(listener2).toHaveBeenCalledWith(7);
      expect(eventEmitter.size).toBe(0);
    });
  });

  describe("unsubscribe", () => {
    it("should be idempotent", () => {
      const eventEmitter = emitter();
      const listener = vi.fn();

      const unsubscribe = eventEmitter.on(listener);
      unsubscribe();
      unsubscribe();
      eventEmitter.emit();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("emission snapshot", () => {
    it("should not call listeners added during emit", () => {
      const eventEmitter = emitter();
      const late = vi.fn();

      eventEmitter.on(() => {
        eventEmitter.on(late);
      });
      eventEmitter.emit();

      expect(late).not.toHaveBeenCalled();

      eventEmitter.emit();
      expect(late).toHaveBeenCalledTimes(1);
    });

    it("should still call listeners removed during emit", () => {
      const eventEmitter = emitter();
      const second = vi.fn();
      let unsubscribeSecond: VoidFunction = () => {};

      eventEmitter.on(() => unsubscribeSecond());
      unsubscribeSecond = eventEmitter.on(second);
      eventEmitter.emit();

      expect(second).toHaveBeenCalledTimes(1);
      expect(eventEmitter.size).toBe(1);
    });
  });

  describe("clear / emitAndClear", () => {
    it("should remove all listeners on clear", () => {
      const eventEmitter = emitter<string>();
      const listener = vi.fn();

      eventEmitter.on(listener);
      eventEmitter.clear();
      eventEmitter.emit("ignored");

      expect(listener).not.toHaveBeenCalled();
      expect(eventEmitter.size).toBe(0);
    });

    it("should emit once then drop listeners on emitAndClear", () => {
      const eventEmitter = emitter<string>();
      const listener = vi.fn();

      eventEmitter.on(listener);
      eventEmitter.emitAndClear("bye");
      eventEmitter.emit("again");

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith("bye");
    });
  });
});
