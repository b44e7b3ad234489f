import { promises as fs } from "fs";
import { join } from "path";
import { z } from "zod";
import { COMPRESSION_STRATEGIES } from "../compression/types";
import { DatabaseError, err, ok, type Result } from "../errors";
import { PROVIDER_TYPES } from "../types";
import { isMissingDirectory, writeJsonAtomic } from "../utils/files";
import { Logger } from "../utils/logger";
import type { ChatSession } from "./sessionRepository";

const contentBlockSchema = z.union([
  z.object({ type: z.literal("text"), text: z.string() }),
  z
    .object({ type: z.literal("tool_use"), id: z.string(), name: z.string(), input: z.unknown() })
    .transform(({ id, name, input }) => ({ type: "tool_use" as const, id, name, input })),
  z.object({ type: z.literal("tool_result"), toolUseId: z.string(), content: z.string() }),
]);

const messageContentSchema = z.union([
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("multimodal"),
    text: z.string().optional(),
    images: z.array(
      z.object({ data: z.string(), mimeType: z.string(), source: z.enum(["base64", "url", "local_file"]) }),
    ),
  }),
  z.object({ type: z.literal("structured"), blocks: z.array(contentBlockSchema) }),
]);

const messageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: messageContentSchema,
  timestamp: z.number(),
  metadata: z
    .object({
      model: z.string(),
      responseTime: z.number(),
      inputTokens: z.number(),
      outputTokens: z.number(),
      totalTokens: z.number(),
      estimatedInputTokens: z.number(),
      estimatedOutputTokens: z.number(),
      estimatedTotalTokens: z.number(),
    })
    .optional(),
});

const storedSessionSchema = z.object({
  id: z.string().min(1),
  providerId: z.enum(PROVIDER_TYPES),
  title: z.string().optional(),
  scheduledTaskId: z.string().optional(),
  messages: z.array(messageSchema),
  archivedMessages: z.array(messageSchema),
  compressionConfig: z.object({
    strategy: z.enum(COMPRESSION_STRATEGIES),
    fullReplacementMessageThreshold: z.number(),
    slidingWindowMessageThreshold: z.number(),
    slidingWindowKeepLast: z.number(),
    tokenBasedThresholdPercent: z.number(),
    tokenBasedKeepPercent: z.number(),
  }),
  compressionCount: z.number().int().nonnegative(),
  createdAt: z.number(),
  lastAccessedAt: z.number(),
  metadata: z.record(z.string()),
});

/** One pretty-printed JSON file per session under `dir`. */
export class JsonSessionStorage {
  private logger: Logger;

  constructor(
    private readonly dir: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger({ service: "JsonSessionStorage" });
  }

  async saveSession(session: ChatSession): Promise<Result<void>> {
    try {
      await writeJsonAtomic(this.sessionFilePath(session.id), session);
      this.logger.debug("Saved session", { sessionId: session.id, messages: session.messages.length });
      return ok(undefined);
    } catch (error) {
      this.logger.error(`Failed to save session ${session.id}`, error);
      return err(new DatabaseError(`Failed to save session ${session.id}`, { cause: error }));
    }
  }

  /** Every readable session in the directory; broken files are skipped. */
  async loadAllSessions(): Promise<Result<ChatSession[]>> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissingDirectory(error)) return ok([]);
      this.logger.error("Failed to list session files", error);
      return err(new DatabaseError("Failed to list session files", { cause: error }));
    }

    const sessions: ChatSession[] = [];
    for (const name of names.filter((file) => file.endsWith(".json")).sort()) {
      try {
        const record = storedSessionSchema.safeParse(JSON.parse(await fs.readFile(join(this.dir, name), "utf-8")));
        if (record.success) {
          sessions.push(record.data);
        } else {
          this.logger.warn(`Session file ${name} has an invalid shape`, { issues: record.error.issues.length });
        }
      } catch (error) {
        this.logger.warn(`Failed to load session file ${name}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.logger.info("Loaded sessions from storage", { count: sessions.length });
    return ok(sessions);
  }

  async deleteSession(sessionId: string): Promise<Result<void>> {
    try {
      await fs.rm(this.sessionFilePath(sessionId), { force: true });
      this.logger.info("Deleted session file", { sessionId });
      return ok(undefined);
    } catch (error) {
      this.logger.error(`Failed to delete session ${sessionId}`, error);
      return err(new DatabaseError(`Failed to delete session ${sessionId}`, { cause: error }));
    }
  }

  private sessionFilePath(sessionId: string): string {
    return join(this.dir, `${sessionId}.json`);
  }
}
