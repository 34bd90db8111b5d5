import { describe, it, expect, vi } from "vitest";
import { createEventBus, eventBus, REACHABILITY_CHANGED } from "./eventBus";

type TestEvents = {
  ping: number;
  pong: string;
};

describe("createEventBus", () => {
  it("should deliver payloads to listeners of the same name only", () => {
    const bus = createEventBus<TestEvents>();
    const onPing = vi.fn();
    const onPong = vi.fn();

    bus.on("ping", onPing);
    bus.on("pong", onPong);
    bus.emit("ping", 1);

    expect(onPing).toHaveBeenCalledWith(1);
    expect(onPong).not.toHaveBeenCalled();
  });

  it("should ignore events nobody listens to", () => {
    const bus = createEventBus<TestEvents>();

    expect(() => bus.emit("pong", "nobody")).not.toThrow();
    expect(bus.listenerCount("pong")).toBe(0);
  });

  it("should unsubscribe", () => {
    const bus = createEventBus<TestEvents>();
    const onPing = vi.fn();

    const unsubscribe = bus.on("ping", onPing);
    expect(bus.listenerCount("ping")).toBe(1);

    unsubscribe();
    bus.emit("ping", 2);

    expect(onPing).not.toHaveBeenCalled();
    expect(bus.listenerCount("ping")).toBe(0);
  });

  it("should clear one event or all of them", () => {
    const bus = createEventBus<TestEvents>();
    bus.on("ping", vi.fn());
    bus.on("pong", vi.fn());

    bus.clear("ping");
    expect(bus.listenerCount("ping")).toBe(0);
    expect(bus.listenerCount("pong")).toBe(1);

    bus.clear();
    expect(bus.listenerCount("pong")).toBe(0);
  });
});

describe("eventBus", () => {
  it("should publish reachability events under a fixed name", () => {
    const listener = vi.fn();
    const unsubscribe = eventBus.on(REACHABILITY_CHANGED, listener);

    eventBus.emit(REACHABILITY_CHANGED, {
      isConnectionAvailable: true,
      isInitialConnection: false,
    });
    unsubscribe();

    expect(REACHABILITY_CHANGED).toBe("netreach:reachability-changed");
    expect(listener).toHaveBeenCalledWith({
      isConnectionAvailable: true,
      isInitialConnection: false,
    });
  });
});
