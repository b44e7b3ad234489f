import { Logger } from "../utils/logger";
import { sleep } from "../utils/sleep";
import type { ScheduledTask } from "./types";

/**
 * Drives one task's recurring execution. Each instance runs its own loop, so
 * schedulers never block one another and a failing tick never ends the schedule.
 *
 * Subclasses supply the task body in `onTaskExecution` and may override
 * `onTaskError`, which only logs by default. Failed ticks are retried on the
 * next interval with no backoff.
 */
export abstract class TaskScheduler<T extends ScheduledTask> {
  protected readonly logger: Logger;
  private running = false;
  private disposed = false;
  private controller?: AbortController;
  private loop?: Promise<void>;
  private nextExecutionAt = 0;

  constructor(
    readonly task: T,
    logger?: Logger,
  ) {
    this.logger = (logger ?? new Logger({ service: "TaskScheduler" })).child({ taskId: task.id });
  }

  /** Task body for one tick. `signal` aborts when the scheduler stops. */
  protected abstract onTaskExecution(signal: AbortSignal): Promise<void>;

  protected async onTaskError(error: unknown): Promise<void> {
    this.logger.error("Task execution failed", error);
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Wall-clock ms of the next tick, 0 when not running. */
  get nextExecutionTime(): number {
    return this.nextExecutionAt;
  }

  start(): void {
    if (this.disposed) {
      this.logger.warn("Scheduler was shut down and cannot be restarted");
      return;
    }
    if (this.running) {
      this.logger.info("Scheduler already running");
      return;
    }

    this.running = true;
    const controller = new AbortController();
    this.controller = controller;
    this.logger.info("Scheduler started", {
      intervalSeconds: this.task.intervalSeconds,
      executeImmediately: this.task.executeImmediately,
    });

    this.loop = this.run(controller.signal).catch((error: unknown) => {
      this.logger.error("Scheduler loop crashed", error);
    });
  }

  stop(): void {
    if (!this.running) {
      this.logger.info("Scheduler not running");
      return;
    }

    this.running = false;
    this.controller?.abort();
    this.controller = undefined;
    this.nextExecutionAt = 0;
    this.logger.info("Scheduler stopped");
  }

  /** Stops the scheduler for good and waits for an in-flight tick, which is aborted, to settle. */
  async shutdown(): Promise<void> {
    if (this.running) this.stop();
    this.disposed = true;
    await this.loop;
  }

  getSecondsUntilNextExecution(): number {
    if (!this.running || this.nextExecutionAt === 0) return 0;
    return Math.max(0, (this.nextExecutionAt - Date.now()) / 1000);
  }

  private isActive(signal: AbortSignal): boolean {
    return this.running && !signal.aborted;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const intervalMs = this.task.intervalSeconds * 1000;

    if (this.task.executeImmediately && this.isActive(signal)) {
      await this.executeTask(signal);
    }

    while (this.isActive(signal)) {
      this.nextExecutionAt = Date.now() + intervalMs;
      const elapsed = await sleep(intervalMs, signal);
      if (!elapsed || !this.isActive(signal)) break;
      await this.executeTask(signal);
    }
  }

  private async executeTask(signal: AbortSignal): Promise<void> {
    try {
      this.logger.debug("Executing task");
      await this.onTaskExecution(signal);
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug("Tick cancelled", { error: error instanceof Error ? error.message : String(error) });
        return;
      }
      try {
        await this.onTaskError(error);
      } catch (handlerError) {
        this.logger.error("Task error handler failed", handlerError);
      }
    }
  }
}
