import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createUpdateLoop } from "@/lib/updateLoop";

function setup(intervalMs = 20) {
  let interval = intervalMs;
  const handlers = {
    onStart: vi.fn(),
    onStop: vi.fn(),
    onPause: vi.fn(),
    onResume: vi.fn(),
    onTick: vi.fn<(manual: boolean) => void>(),
    getIntervalMs: () => interval,
  };
  const loop = createUpdateLoop(handlers);
  return {
    loop,
    handlers,
    setInterval: (next: number) => {
      interval = next;
    },
  };
}

describe("createUpdateLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("ticks once per interval while running", () => {
    const { loop, handlers } = setup();

    loop.start();
    vi.advanceTimersByTime(19);
    expect(handlers.onTick).not.toHaveBeenCalled();

    vi.advanceTimersByTime(41);
    expect(handlers.onTick).toHaveBeenCalledTimes(3);
    expect(handlers.onTick).toHaveBeenLastCalledWith(false);
    expect(handlers.onStart).toHaveBeenCalledTimes(1);

    loop.stop();
  });

  it("ignores a second start", () => {
    const { loop, handlers } = setup();

    loop.start();
    loop.start();
    vi.advanceTimersByTime(20);

    expect(handlers.onStart).toHaveBeenCalledTimes(1);
    expect(handlers.onTick).toHaveBeenCalledTimes(1);

    loop.stop();
  });

  it("holds while paused and picks up again on resume", () => {
    const { loop, handlers } = setup();

    loop.start();
    vi.advanceTimersByTime(20);
    loop.pause();
    vi.advanceTimersByTime(200);

    expect(handlers.onTick).toHaveBeenCalledTimes(1);
    expect(loop.isPaused()).toBe(true);
    expect(loop.isRunning()).toBe(true);

    loop.resume();
    vi.advanceTimersByTime(20);

    expect(handlers.onTick).toHaveBeenCalledTimes(2);
    expect(handlers.onPause).toHaveBeenCalledTimes(1);
    expect(handlers.onResume).toHaveBeenCalledTimes(1);

    loop.stop();
  });

  it("steps manually only when not ticking by itself", () => {
    const { loop, handlers } = setup();

    loop.step();
    expect(handlers.onTick).toHaveBeenCalledTimes(1);
    expect(handlers.onTick).toHaveBeenLastCalledWith(true);

    loop.start();
    loop.step();
    expect(handlers.onTick).toHaveBeenCalledTimes(1);

    loop.pause();
    loop.step();
    expect(handlers.onTick).toHaveBeenCalledTimes(2);

    loop.stop();
  });

  it("stops ticking after stop", () => {
    const { loop, handlers } = setup();

    loop.start();
    vi.advanceTimersByTime(40);
    loop.stop();
    vi.advanceTimersByTime(200);

    expect(handlers.onTick).toHaveBeenCalledTimes(2);
    expect(handlers.onStop).toHaveBeenCalledTimes(1);
    expect(loop.isRunning()).toBe(false);
    expect(loop.isPaused()).toBe(false);
  });

  it("applies a new interval from the next scheduling on", () => {
    const { loop, handlers, setInterval } = setup(20);

    loop.start();
    setInterval(50);
    vi.advanceTimersByTime(20);
    expect(handlers.onTick).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(49);
    expect(handlers.onTick).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(1);
    expect(handlers.onTick).toHaveBeenCalledTimes(2);

    loop.stop();
  });

  it("does not reschedule when a tick stops the loop", () => {
    const { loop, handlers } = setup();
    handlers.onTick.mockImplementation(() => {
      loop.stop();
    });

    loop.start();
    vi.advanceTimersByTime(100);

    expect(handlers.onTick).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });
});
