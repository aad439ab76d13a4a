/**
 * Event transformers decide when a bloc's handler runs for each incoming
 * event. Each `on(...)` registration gets its own dispatcher.
 */

/** One handler invocation for one event. `run` never rejects. */
export interface EventJob {
  run(): Promise<void>;
  /** Stop the job: a queued job never starts, a running one has its emitter closed. */
  cancel(): void;
}

export interface EventDispatcher {
  dispatch(job: EventJob): void;
  /** Cancel everything not yet started. */
  close(): void;
}

export type EventTransformer = () => EventDispatcher;

/** Process every event immediately; handlers may overlap. */
export function concurrent(): EventTransformer {
  return () => ({
    dispatch(job) {
      void job.run();
    },
    close() {},
  });
}

/** Process events one at a time, in arrival order. */
export function sequential(): EventTransformer {
  return () => {
    const queue: EventJob[] = [];
    let running = false;
    const pump = async (): Promise<void> => {
      running = true;
      try {
        for (let job = queue.shift(); job; job = queue.shift()) await job.run();
      } finally {
        running = false;
      }
    };
    return {
      dispatch(job) {
        queue.push(job);
        if (!running) void pump();
      },
      close() {
        for (const job of queue.splice(0)) job.cancel();
      },
    };
  };
}

/** Ignore events that arrive while a previous one is still being handled. */
export function droppable(): EventTransformer {
  return () => {
    let running = false;
    return {
      dispatch(job) {
        if (running) {
          job.cancel();
          return;
        }
        running = true;
        void job.run().finally(() => {
          running = false;
        });
      },
      close() {},
    };
  };
}

/** Cancel the event being handled when a new one arrives, then handle the new one. */
export function restartable(): EventTransformer {
  return () => {
    let current: EventJob | null = null;
    return {
      dispatch(job) {
        current?.cancel();
        current = job;
        void job.run().finally(() => {
          if (current === job) current = null;
        });
      },
      close() {
        current = null;
      },
    };
  };
}

/** Handle only the last event of a burst, `ms` after it arrived. */
export function debounce(ms: number): EventTransformer {
  return () => {
    let waiting: EventJob | null = null;
    let timer: ReturnType<typeof setTimeout> | null = null;
    return {
      dispatch(job) {
        if (timer) clearTimeout(timer);
        waiting?.cancel();
        waiting = job;
        timer = setTimeout(() => {
          timer = null;
          waiting = null;
          void job.run();
        }, ms);
      },
      close() {
        if (timer) clearTimeout(timer);
        timer = null;
        waiting?.cancel();
        waiting = null;
      },
    };
  };
}
