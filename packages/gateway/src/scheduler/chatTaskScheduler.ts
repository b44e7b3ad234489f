import { err, ok, toAIError, unwrap, type Result } from "../errors";
import type { ChatRouter } from "../router";
import type { SessionRepository } from "../sessions/sessionRepository";
import { Logger } from "../utils/logger";
import { TaskScheduler } from "./taskScheduler";
import type { ScheduledChatTask, TaskBindingRegistry } from "./types";

const TITLE_PREVIEW_CHARS = 50;

export function formatInterval(seconds: number): string {
  if (seconds < 60) return `${seconds} seconds`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)} minutes`;
  if (seconds < 86400) return `${Math.floor(seconds / 3600)} hours`;
  return `${Math.floor(seconds / 86400)} days`;
}

export function defaultTaskTitle(task: ScheduledChatTask): string {
  return task.title ?? `Task: ${task.taskRequest.slice(0, TITLE_PREVIEW_CHARS)}...`;
}

export interface ChatTaskSchedulerDeps {
  router: ChatRouter;
  sessions: SessionRepository;
  bindings: TaskBindingRegistry;
  logger?: Logger;
}

/** Resends a task's request through the chat router on every tick. */
export class ChatTaskScheduler extends TaskScheduler<ScheduledChatTask> {
  private router: ChatRouter;
  private sessions: SessionRepository;
  private bindings: TaskBindingRegistry;

  constructor(task: ScheduledChatTask, deps: ChatTaskSchedulerDeps) {
    super(task, deps.logger ?? new Logger({ service: "ChatTaskScheduler" }));
    this.router = deps.router;
    this.sessions = deps.sessions;
    this.bindings = deps.bindings;
  }

  /** Creates the task's session, binds it and posts the intro message. */
  async initialize(): Promise<Result<string>> {
    try {
      const providerId = this.task.providerId ?? this.router.defaultProvider;
      const session = unwrap(
        await this.sessions.createSession(providerId, { scheduledTaskId: this.task.id }),
      );
      this.bindings.bind(this.task.id, session.id);

      const interval = formatInterval(this.task.intervalSeconds);
      unwrap(
        await this.sessions.appendMessage(
          session.id,
          "assistant",
          `I am a task scheduler.\nEvery ${interval} I will run the task: ${this.task.taskRequest}`,
        ),
      );
      unwrap(await this.sessions.setTitle(session.id, defaultTaskTitle(this.task)));

      this.logger.info("Chat task initialized", { sessionId: session.id });
      return ok(session.id);
    } catch (error) {
      this.logger.error("Chat task initialization failed", error);
      return err(toAIError(error));
    }
  }

  protected async onTaskExecution(signal: AbortSignal): Promise<void> {
    const binding = this.bindings.get(this.task.id);
    if (!binding) {
      this.logger.error("Task has no bound session");
      return;
    }

    this.logger.debug("Sending task request", { sessionId: binding.sessionId });
    const result = await this.router.sendMessage({
      message: this.task.taskRequest,
      sessionId: binding.sessionId,
      providerId: this.task.providerId ?? this.router.defaultProvider,
      model: this.task.model,
      signal,
    });
    if (!result.ok) throw result.error;
  }

  protected async onTaskError(error: unknown): Promise<void> {
    await super.onTaskError(error);

    const binding = this.bindings.get(this.task.id);
    if (!binding) return;

    const message = error instanceof Error && error.message.length > 0 ? error.message : "Unknown error";
    const text = `Task execution failed:\n${message}\n\nNext attempt in ${formatInterval(this.task.intervalSeconds)}`;

    const appended = await this.sessions.appendMessage(binding.sessionId, "assistant", text);
    if (!appended.ok) {
      this.logger.error("Failed to record task error in session", appended.error);
    }
  }
}
