import { ok, type Result } from "../errors";
import type { Message, ProviderType } from "../types";
import { Logger } from "../utils/logger";
import { InMemorySessionRepository, type ChatSession, type CreateSessionOptions } from "./sessionRepository";
import type { JsonSessionStorage } from "./sessionStorage";

export interface PersistentSessionRepositoryOptions {
  storage: JsonSessionStorage;
  saveDelayMs?: number;
  logger?: Logger;
}

/**
 * In-memory sessions backed by a JSON store. A write marks the session dirty,
 * and every dirty session is saved in one batch `saveDelayMs` after the first
 * mark. Saving is best effort: a failed save stays dirty for the next batch.
 */
export class PersistentSessionRepository extends InMemorySessionRepository {
  private readonly storage: JsonSessionStorage;
  private readonly saveDelayMs: number;
  private readonly logger: Logger;
  private readonly dirty = new Set<string>();
  private timer?: ReturnType<typeof setTimeout>;
  private pending: Promise<void> = Promise.resolve();
  private closed = false;

  constructor({ storage, saveDelayMs = 1000, logger }: PersistentSessionRepositoryOptions) {
    super();
    this.storage = storage;
    this.saveDelayMs = saveDelayMs;
    this.logger = logger ?? new Logger({ service: "PersistentSessionRepository" });
  }

  /** Reads every stored session into memory. */
  async load(): Promise<Result<number>> {
    const loaded = await this.storage.loadAllSessions();
    if (!loaded.ok) return loaded;
    for (const session of loaded.value) {
      this.sessions.set(session.id, session);
    }
    return ok(loaded.value.length);
  }

  /** Saves every dirty session now. Flushes run one after another. */
  flush(): Promise<void> {
    this.pending = this.pending.then(() => this.saveDirty());
    return this.pending;
  }

  /** Stops the batch timer and writes what is still dirty. */
  async shutdown(): Promise<void> {
    this.closed = true;
    this.clearTimer();
    await this.flush();
    this.logger.info("Session store closed");
  }

  async createSession(providerId: ProviderType, options?: CreateSessionOptions): Promise<Result<ChatSession>> {
    const created = await super.createSession(providerId, options);
    if (created.ok) this.markDirty(created.value.id);
    return created;
  }

  async updateSession(session: ChatSession): Promise<Result<void>> {
    return this.marked(session.id, await super.updateSession(session));
  }

  async deleteSession(sessionId: string): Promise<Result<void>> {
    const deleted = await super.deleteSession(sessionId);
    if (!deleted.ok) return deleted;

    this.dirty.delete(sessionId);
    // A running batch may still hold the session
    await this.pending;
    return this.storage.deleteSession(sessionId);
  }

  async addMessage(sessionId: string, message: Message): Promise<Result<void>> {
    return this.marked(sessionId, await super.addMessage(sessionId, message));
  }

  async clearMessages(sessionId: string): Promise<Result<void>> {
    return this.marked(sessionId, await super.clearMessages(sessionId));
  }

  async replaceMessages(sessionId: string, messages: Message[]): Promise<Result<void>> {
    return this.marked(sessionId, await super.replaceMessages(sessionId, messages));
  }

  async archiveMessages(sessionId: string, messages: Message[]): Promise<Result<void>> {
    return this.marked(sessionId, await super.archiveMessages(sessionId, messages));
  }

  async setTitle(sessionId: string, title: string): Promise<Result<void>> {
    return this.marked(sessionId, await super.setTitle(sessionId, title));
  }

  private marked(sessionId: string, result: Result<void>): Result<void> {
    if (result.ok) this.markDirty(sessionId);
    return result;
  }

  private markDirty(sessionId: string): void {
    this.dirty.add(sessionId);
    this.schedule();
  }

  private schedule(): void {
    if (this.closed || this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.flush().catch((error: unknown) => {
        this.logger.error("Session batch failed", error);
      });
    }, this.saveDelayMs);
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private async saveDirty(): Promise<void> {
    this.clearTimer();
    const ids = [...this.dirty];
    this.dirty.clear();

    let failed = 0;
    for (const id of ids) {
      const session = this.sessions.get(id);
      if (!session) continue;
      const saved = await this.storage.saveSession(session);
      if (!saved.ok) {
        failed++;
        this.dirty.add(id);
      }
    }

    if (failed > 0) {
      this.logger.warn("Sessions left unsaved until the next batch", { failed });
      this.schedule();
    } else if (ids.length > 0) {
      this.logger.debug("Saved session batch", { count: ids.length });
    }
  }
}
