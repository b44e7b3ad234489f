import { promises as fs } from "fs";
import { join } from "path";
import { z } from "zod";
import { DatabaseError, NotFoundError, err, ok, type Result } from "../errors";
import { PROVIDER_TYPES } from "../types";
import { isMissingDirectory, writeJsonAtomic } from "../utils/files";
import { Logger } from "../utils/logger";
import type { ScheduledChatTask } from "./types";

const storedTaskSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  taskRequest: z.string(),
  intervalSeconds: z.number().int().positive(),
  executeImmediately: z.boolean(),
  providerId: z.enum(PROVIDER_TYPES).optional(),
  model: z.string().optional(),
  createdAt: z.number(),
  sessionId: z.string().optional(),
});

/** A task definition as written to disk, together with the session it is bound to. */
export interface StoredTask {
  task: ScheduledChatTask;
  sessionId?: string;
}

function toStoredTask(record: z.infer<typeof storedTaskSchema>): StoredTask {
  const { sessionId, ...task } = record;
  return { task, sessionId };
}

/** One pretty-printed JSON file per task under `dir`. */
export class ScheduledTaskStorage {
  private logger: Logger;

  constructor(
    private readonly dir: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger({ service: "ScheduledTaskStorage" });
  }

  async saveTask(task: ScheduledChatTask, sessionId?: string): Promise<Result<void>> {
    try {
      await writeJsonAtomic(this.taskFilePath(task.id), { ...task, sessionId });
      this.logger.debug("Saved task", { taskId: task.id });
      return ok(undefined);
    } catch (error) {
      this.logger.error(`Failed to save task ${task.id}`, error);
      return err(new DatabaseError(`Failed to save task ${task.id}`, { cause: error }));
    }
  }

  async loadTask(taskId: string): Promise<Result<StoredTask>> {
    let content: string;
    try {
      content = await fs.readFile(this.taskFilePath(taskId), "utf-8");
    } catch (error) {
      return err(new NotFoundError(`Task file not found: ${taskId}`, { cause: error }));
    }
    return this.parse(content, taskId);
  }

  /** Every readable task in the directory; files that fail to parse are skipped. */
  async loadAllTasks(): Promise<Result<StoredTask[]>> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissingDirectory(error)) return ok([]);
      this.logger.error("Failed to list task files", error);
      return err(new DatabaseError("Failed to list task files", { cause: error }));
    }

    const tasks: StoredTask[] = [];
    for (const name of names.filter((file) => file.endsWith(".json")).sort()) {
      try {
        const parsed = this.parse(await fs.readFile(join(this.dir, name), "utf-8"), name);
        if (parsed.ok) tasks.push(parsed.value);
      } catch (error) {
        this.logger.error(`Failed to read task file ${name}`, error);
      }
    }

    this.logger.info("Loaded tasks from storage", { count: tasks.length });
    return ok(tasks);
  }

  async deleteTask(taskId: string): Promise<Result<void>> {
    try {
      await fs.rm(this.taskFilePath(taskId), { force: true });
      this.logger.info("Deleted task file", { taskId });
      return ok(undefined);
    } catch (error) {
      this.logger.error(`Failed to delete task ${taskId}`, error);
      return err(new DatabaseError(`Failed to delete task ${taskId}`, { cause: error }));
    }
  }

  private parse(content: string, source: string): Result<StoredTask> {
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.logger.error(`Task file ${source} is not valid JSON`, error);
      return err(new DatabaseError(`Task file ${source} is not valid JSON`, { cause: error }));
    }

    const record = storedTaskSchema.safeParse(json);
    if (!record.success) {
      const issues = record.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      this.logger.error(`Task file ${source} has an invalid shape`, { issues });
      return err(new DatabaseError(`Task file ${source} has an invalid shape`));
    }
    return ok(toStoredTask(record.data));
  }

  private taskFilePath(taskId: string): string {
    return join(this.dir, `${taskId}.json`);
  }
}
