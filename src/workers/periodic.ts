/**
 * Periodic worker runner
 *
 * A worker is one idempotent pass (`tick`). Ticks of the same worker never
 * overlap: a tick that is still running when the timer fires is skipped.
 */

export interface Worker {
  name: string;
  intervalMs: number;
  tick: () => Promise<void>;
}

export interface RunningWorkers {
  stop: () => void;
}

/**
 * Run one tick, logging a thrown error instead of letting it escape the timer
 */
export async function runTick(worker: Worker): Promise<void> {
  try {
    await worker.tick();
  } catch (err) {
    console.error(`Worker ${worker.name} tick failed:`, err);
  }
}

export function startWorkers(workers: Worker[]): RunningWorkers {
  const timers: NodeJS.Timeout[] = [];

  for (const worker of workers) {
    let running = false;
    const timer = setInterval(() => {
      if (running) {
        return;
      }
      running = true;
      void runTick(worker).finally(() => {
        running = false;
      });
    }, worker.intervalMs);
    timer.unref();
    timers.push(timer);
  }

  return {
    stop() {
      for (const timer of timers) {
        clearInterval(timer);
      }
      timers.length = 0;
    },
  };
}
