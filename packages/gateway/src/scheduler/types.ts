import type { ProviderType } from "../types";

/** What the generic scheduler needs to know about any recurring task. */
export interface ScheduledTask {
  readonly id: string;
  readonly intervalSeconds: number;
  readonly executeImmediately: boolean;
}

export interface ScheduledChatTask extends ScheduledTask {
  readonly title?: string;
  readonly taskRequest: string; // resent verbatim on every tick
  readonly providerId?: ProviderType;
  readonly model?: string;
  readonly createdAt: number;
}

export interface TaskBinding {
  sessionId: string;
}

/** Session each task writes to, kept apart from the immutable task definitions. */
export class TaskBindingRegistry {
  private bindings = new Map<string, TaskBinding>();

  get(taskId: string): TaskBinding | undefined {
    const binding = this.bindings.get(taskId);
    return binding ? { ...binding } : undefined;
  }

  bind(taskId: string, sessionId: string): void {
    this.bindings.set(taskId, { sessionId });
  }

  unbind(taskId: string): void {
    this.bindings.delete(taskId);
  }

  findTaskIdBySession(sessionId: string): string | undefined {
    for (const [taskId, binding] of this.bindings) {
      if (binding.sessionId === sessionId) return taskId;
    }
    return undefined;
  }
}
