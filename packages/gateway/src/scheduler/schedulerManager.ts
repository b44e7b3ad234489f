import { v4 as uuidv4 } from "uuid";
import { NotFoundError, ValidationError, err, ok, type Result } from "../errors";
import type { ChatRouter } from "../router";
import type { SessionRepository } from "../sessions/sessionRepository";
import type { ProviderType } from "../types";
import { Logger } from "../utils/logger";
import { ChatTaskScheduler } from "./chatTaskScheduler";
import type { ScheduledTaskStorage } from "./taskStorage";
import { TaskBindingRegistry, type ScheduledChatTask } from "./types";

export const DEFAULT_MIN_INTERVAL_SECONDS = 10;

export interface CreateTaskInput {
  title?: string;
  taskRequest: string;
  intervalSeconds: number;
  executeImmediately?: boolean;
  providerId?: ProviderType;
  model?: string;
}

export interface CreatedTask {
  taskId: string;
  sessionId: string;
}

export interface ScheduledTaskInfo {
  id: string;
  title?: string;
  taskRequest: string;
  intervalSeconds: number;
  executeImmediately: boolean;
  sessionId?: string;
  createdAt: number;
  isRunning: boolean;
  secondsUntilNext: number;
  providerId?: ProviderType;
  model?: string;
}

export interface SchedulerManagerDeps {
  router: ChatRouter;
  sessions: SessionRepository;
  storage: ScheduledTaskStorage;
  bindings?: TaskBindingRegistry;
  minIntervalSeconds?: number;
  logger?: Logger;
}

/** Owns one ChatTaskScheduler per task and keeps the task files in step with them. */
export class SchedulerManager {
  private schedulers = new Map<string, ChatTaskScheduler>();
  private router: ChatRouter;
  private sessions: SessionRepository;
  private storage: ScheduledTaskStorage;
  private bindings: TaskBindingRegistry;
  private minIntervalSeconds: number;
  private logger: Logger;

  constructor(deps: SchedulerManagerDeps) {
    this.router = deps.router;
    this.sessions = deps.sessions;
    this.storage = deps.storage;
    this.bindings = deps.bindings ?? new TaskBindingRegistry();
    this.minIntervalSeconds = deps.minIntervalSeconds ?? DEFAULT_MIN_INTERVAL_SECONDS;
    this.logger = deps.logger ?? new Logger({ service: "SchedulerManager" });
  }

  async createTask(input: CreateTaskInput): Promise<Result<CreatedTask>> {
    const errors: string[] = [];
    if (input.taskRequest.trim().length === 0) {
      errors.push("Task request must not be blank");
    }
    if (!Number.isInteger(input.intervalSeconds) || input.intervalSeconds < this.minIntervalSeconds) {
      errors.push(`Interval must be at least ${this.minIntervalSeconds} seconds`);
    }
    if (errors.length > 0) {
      return err(new ValidationError("Invalid scheduled task", errors));
    }

    const task: ScheduledChatTask = {
      id: uuidv4(),
      title: input.title,
      taskRequest: input.taskRequest,
      intervalSeconds: input.intervalSeconds,
      executeImmediately: input.executeImmediately ?? false,
      providerId: input.providerId,
      model: input.model,
      createdAt: Date.now(),
    };
    this.logger.info("Creating scheduled task", { taskId: task.id });

    const scheduler = this.createScheduler(task);
    const initialized = await scheduler.initialize();
    if (!initialized.ok) return initialized;

    scheduler.start();
    this.schedulers.set(task.id, scheduler);
    await this.persist(task);

    this.logger.info("Scheduled task started", { taskId: task.id, sessionId: initialized.value });
    return ok({ taskId: task.id, sessionId: initialized.value });
  }

  startTask(taskId: string): Result<void> {
    const scheduler = this.schedulers.get(taskId);
    if (!scheduler) return err(taskNotFound(taskId));
    scheduler.start();
    return ok(undefined);
  }

  stopTask(taskId: string): Result<void> {
    const scheduler = this.schedulers.get(taskId);
    if (!scheduler) return err(taskNotFound(taskId));
    scheduler.stop();
    return ok(undefined);
  }

  /** Stops the task for good and removes its file and session. */
  async deleteTask(taskId: string): Promise<Result<void>> {
    const scheduler = this.schedulers.get(taskId);
    if (!scheduler) return err(taskNotFound(taskId));

    this.logger.info("Deleting scheduled task", { taskId });
    await scheduler.shutdown();
    this.schedulers.delete(taskId);

    const binding = this.bindings.get(taskId);
    this.bindings.unbind(taskId);

    const deleted = await this.storage.deleteTask(taskId);
    if (!deleted.ok) return deleted;

    if (binding) {
      const removed = await this.sessions.deleteSession(binding.sessionId);
      if (!removed.ok) {
        this.logger.warn("Task session already gone", { taskId, sessionId: binding.sessionId });
      }
    }
    return ok(undefined);
  }

  getTask(taskId: string): ScheduledChatTask | undefined {
    return this.schedulers.get(taskId)?.task;
  }

  getTaskInfo(taskId: string): ScheduledTaskInfo | undefined {
    const scheduler = this.schedulers.get(taskId);
    return scheduler ? this.infoOf(scheduler) : undefined;
  }

  listTasks(): ScheduledTaskInfo[] {
    return [...this.schedulers.values()].map((scheduler) => this.infoOf(scheduler));
  }

  getTaskBySessionId(sessionId: string): ScheduledChatTask | undefined {
    const taskId = this.bindings.findTaskIdBySession(sessionId);
    return taskId === undefined ? undefined : this.getTask(taskId);
  }

  /**
   * Restores persisted tasks and starts them. A task whose session no longer
   * exists gets a fresh one.
   */
  async loadAll(): Promise<Result<number>> {
    const stored = await this.storage.loadAllTasks();
    if (!stored.ok) return stored;

    let restored = 0;
    for (const { task, sessionId } of stored.value) {
      if (this.schedulers.has(task.id)) continue;

      const scheduler = this.createScheduler(task);
      const session = sessionId === undefined ? undefined : await this.sessions.getSession(sessionId);
      if (session?.ok) {
        this.bindings.bind(task.id, session.value.id);
      } else {
        const initialized = await scheduler.initialize();
        if (!initialized.ok) {
          this.logger.error(`Failed to restore task ${task.id}`, initialized.error);
          continue;
        }
        await this.persist(task);
      }

      scheduler.start();
      this.schedulers.set(task.id, scheduler);
      restored++;
    }

    this.logger.info("Restored scheduled tasks", { count: restored });
    return ok(restored);
  }

  /** Stops every scheduler and writes every task back to storage. */
  async shutdown(): Promise<void> {
    this.logger.info("Shutting down scheduled tasks", { count: this.schedulers.size });
    const schedulers = [...this.schedulers.values()];
    this.schedulers.clear();

    await Promise.all(
      schedulers.map(async (scheduler) => {
        await scheduler.shutdown();
        await this.persist(scheduler.task);
      }),
    );
    this.logger.info("Scheduled tasks shut down");
  }

  private createScheduler(task: ScheduledChatTask): ChatTaskScheduler {
    return new ChatTaskScheduler(task, {
      router: this.router,
      sessions: this.sessions,
      bindings: this.bindings,
      logger: this.logger,
    });
  }

  private async persist(task: ScheduledChatTask): Promise<void> {
    const saved = await this.storage.saveTask(task, this.bindings.get(task.id)?.sessionId);
    if (!saved.ok) {
      this.logger.warn("Task kept in memory only", { taskId: task.id, error: saved.error.message });
    }
  }

  private infoOf(scheduler: ChatTaskScheduler): ScheduledTaskInfo {
    const { task } = scheduler;
    return {
      id: task.id,
      title: task.title,
      taskRequest: task.taskRequest,
      intervalSeconds: task.intervalSeconds,
      executeImmediately: task.executeImmediately,
      sessionId: this.bindings.get(task.id)?.sessionId,
      createdAt: task.createdAt,
      isRunning: scheduler.isRunning,
      secondsUntilNext: Math.floor(scheduler.getSecondsUntilNextExecution()),
      providerId: task.providerId,
      model: task.model,
    };
  }
}

function taskNotFound(taskId: string): NotFoundError {
  return new NotFoundError(`Task not found: ${taskId}`);
}
