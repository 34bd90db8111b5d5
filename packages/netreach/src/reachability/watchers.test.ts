import { describe, it, expect, vi } from "vitest";
import type { ReachabilityWatcher } from "../types";
import { watcherRegistry } from "./watchers";

const watcher = (
  onNetworkReachabilityChanged: (isEndpointReachable: boolean) => void
): ReachabilityWatcher => ({ onNetworkReachabilityChanged });

describe("watcherRegistry", () => {
  it("should notify watchers in registration order", () => {
    const registry = watcherRegistry();
    const calls: string[] = [];

    registry.add(watcher((value) => calls.push(`a:${value}`)));
    registry.add(watcher((value) => calls.push(`b:${value}`)));
    registry.add(watcher((value) => calls.push(`c:${value}`)));
    registry.notify(true);

    expect(calls).toEqual(["a:true", "b:true", "c:true"]);
    expect(registry.size).toBe(3);
  });

  it("should keep a watcher registered twice twice", () => {
    const registry = watcherRegistry();
    const same = watcher(vi.fn());

    registry.add(same);
    registry.add(same);
    registry.notify(false);

    expect(same.onNetworkReachabilityChanged).toHaveBeenCalledTimes(2);
  });

  it("should not deliver the in-flight value to watchers added during notify", () => {
    const registry = watcherRegistry();
    const late = watcher(vi.fn());

    registry.add(watcher(() => registry.add(late)));
    registry.notify(true);

    expect(late.onNetworkReachabilityChanged).not.toHaveBeenCalled();

    registry.notify(false);
    expect(late.onNetworkReachabilityChanged).toHaveBeenCalledWith(false);
  });

  it("should keep notifying after a watcher throws", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const registry = watcherRegistry();
    const after = watcher(vi.fn());
    const failure = new Error("boom");

    registry.add(
      watcher(() => {
        throw failure;
      })
    );
    registry.add(after);
    registry.notify(true);

    expect(after.onNetworkReachabilityChanged).toHaveBeenCalledWith(true);
    expect(error).toHaveBeenCalledWith(
      "[netreach] Reachability watcher threw:",
      failure
    );
  });

  it("should stop once the guard turns false", () => {
    const registry = watcherRegistry();
    let live = true;
    const first = watcher(vi.fn(() => {
      live = false;
    }));
    const second = watcher(vi.fn());
    registry.add(first);
    registry.add(second);

    registry.notify(false, () => live);

    expect(first.onNetworkReachabilityChanged).toHaveBeenCalledWith(false);
    expect(second.onNetworkReachabilityChanged).not.toHaveBeenCalled();
  });

  it("should drop every watcher on clear", () => {
    const registry = watcherRegistry();
    const removed = watcher(vi.fn());

    registry.add(removed);
    registry.clear();
    registry.notify(true);

    expect(removed.onNetworkReachabilityChanged).not.toHaveBeenCalled();
    expect(registry.size).toBe(0);
  });
});
