type UpdateLoopHandlers = {
  onStart: () => void;
  onStop: () => void;
  onPause: () => void;
  onResume: () => void;
  // One simulation tick; `manual` is true for step() calls
  onTick: (manual: boolean) => void;
  // Read before every scheduling so interval changes apply on the next tick
  getIntervalMs: () => number;
};

/**
 * Fixed-interval tick driver.
 *
 * Runs on timers instead of animation frames: the core has no display to
 * sync with, the driver only decides the cadence.
 */
export const createUpdateLoop = (handlers: UpdateLoopHandlers) => {
  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  let isRunning = false;
  let isPaused = false;

  const { onStart, onStop, onPause, onResume, onTick, getIntervalMs } =
    handlers;

  const schedule = () => {
    timeoutId = setTimeout(update, getIntervalMs());
  };

  const update = () => {
    timeoutId = null;
    if (!isRunning || isPaused) return;
    onTick(false);
    // onTick may have stopped or paused the loop
    if (isRunning && !isPaused) {
      schedule();
    }
  };

  const stopUpdating = () => {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
      timeoutId = null;
    }
  };

  const startUpdating = () => {
    if (timeoutId !== null) return;
    schedule();
  };

  const start = () => {
    if (isRunning) return;
    isRunning = true;
    isPaused = false;
    startUpdating();
    onStart();
  };

  const pause = () => {
    if (!isRunning || isPaused) return;
    isPaused = true;
    stopUpdating();
    onPause();
  };

  const resume = () => {
    if (!isRunning || !isPaused) return;
    isPaused = false;
    startUpdating();
    onResume();
  };

  const stop = () => {
    if (!isRunning) return;
    stopUpdating();
    isRunning = false;
    isPaused = false;
    onStop();
  };

  // Single manual tick, only while the loop is not ticking by itself
  const step = () => {
    if (isRunning && !isPaused) return;
    onTick(true);
  };

  return {
    start,
    stop,
    pause,
    resume,
    step,
    isRunning: () => isRunning,
    isPaused: () => isPaused,
  };
};

export type UpdateLoop = ReturnType<typeof createUpdateLoop>;
