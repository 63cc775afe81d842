// Periodic tick driver: every registered task runs once per tick, in registration order

export interface ScheduledTask {
  initialize?(): void;
  execute(): void;
  /** Checked after each execute; true unregisters the task */
  isFinished?(): boolean;
  end?(interrupted: boolean): void;
}

export type TaskHandle = number;

export interface Scheduler {
  register(task: ScheduledTask): TaskHandle;
  cancel(handle: TaskHandle): void;
  isActive(handle: TaskHandle): boolean;
}

export const DEFAULT_TICK_MS = 20;

export class TickScheduler implements Scheduler {
  private tasks: Map<TaskHandle, ScheduledTask> = new Map();
  private nextHandle: TaskHandle = 1;
  private timerId: ReturnType<typeof setInterval> | null = null;
  private tickRunning: boolean = false;
  private periodMs: number;

  onLog?: (msg: string) => void;
  onError?: (err: unknown) => void;

  constructor(periodMs: number = DEFAULT_TICK_MS) {
    this.periodMs = periodMs;
  }

  private log(msg: string): void {
    this.onLog?.(msg);
    console.log(msg);
  }

  get running(): boolean {
    return this.timerId !== null;
  }

  get taskCount(): number {
    return this.tasks.size;
  }

  register(task: ScheduledTask): TaskHandle {
    task.initialize?.();
    const handle = this.nextHandle++;
    this.tasks.set(handle, task);
    return handle;
  }

  cancel(handle: TaskHandle): void {
    const task = this.tasks.get(handle);
    if (!task) return;
    this.tasks.delete(handle);
    task.end?.(true);
  }

  isActive(handle: TaskHandle): boolean {
    return this.tasks.has(handle);
  }

  /**
   * Run every active task once. A task that throws is dropped, the rest of the
   * tick still runs, and the first error is rethrown afterwards.
   */
  tick(): void {
    // Never re-enter: a callback that triggers a tick must not run tasks twice
    if (this.tickRunning) return;
    this.tickRunning = true;

    let failed = false;
    let failure: unknown;

    try {
      for (const [handle, task] of [...this.tasks]) {
        // Cancelled by an earlier task during this tick
        if (!this.tasks.has(handle)) continue;

        try {
          task.execute();
          if (task.isFinished?.()) {
            this.tasks.delete(handle);
            task.end?.(false);
          }
        } catch (err) {
          this.tasks.delete(handle);
          if (!failed) {
            failed = true;
            failure = err;
          }
        }
      }
    } finally {
      this.tickRunning = false;
    }

    if (failed) throw failure;
  }

  start(): void {
    if (this.timerId) return;
    this.timerId = setInterval(() => this.runTick(), this.periodMs);
    this.log(`[Scheduler] Started (${this.periodMs}ms tick)`);
  }

  stop(): void {
    if (this.timerId) {
      clearInterval(this.timerId);
      this.timerId = null;
    }
    this.log('[Scheduler] Stopped');
  }

  private runTick(): void {
    try {
      this.tick();
    } catch (err) {
      console.error('[Scheduler] Task failed:', err);
      this.onLog?.(`[Scheduler] Task failed: ${err instanceof Error ? err.message : String(err)}`);
      this.onError?.(err);
    }
  }
}
