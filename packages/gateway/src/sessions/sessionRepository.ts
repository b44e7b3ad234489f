import { v4 as uuidv4 } from "uuid";
import { DEFAULT_COMPRESSION_CONFIG, type CompressionConfig } from "../compression/types";
import { NotFoundError, err, ok, type Result } from "../errors";
import { textMessage, type Message, type MessageRole, type ProviderType } from "../types";

export interface ChatSession {
  id: string;
  providerId: ProviderType;
  title?: string;
  scheduledTaskId?: string;
  messages: Message[];
  archivedMessages: Message[]; // removed by compression, kept for reference
  compressionConfig: CompressionConfig;
  compressionCount: number;
  createdAt: number;
  lastAccessedAt: number;
  metadata: Record<string, string>;
}

export interface CreateSessionOptions {
  title?: string;
  scheduledTaskId?: string;
  compressionConfig?: CompressionConfig;
  metadata?: Record<string, string>;
}

/**
 * Conversation store. Every call resolves to a Result; unknown ids fail with
 * NotFoundError. Returned sessions are snapshots, so callers write back through
 * the repository.
 */
export interface SessionRepository {
  createSession(providerId: ProviderType, options?: CreateSessionOptions): Promise<Result<ChatSession>>;
  getSession(sessionId: string): Promise<Result<ChatSession>>;
  listSessions(): Promise<Result<ChatSession[]>>;
  updateSession(session: ChatSession): Promise<Result<void>>;
  deleteSession(sessionId: string): Promise<Result<void>>;
  addMessage(sessionId: string, message: Message): Promise<Result<void>>;
  appendMessage(sessionId: string, role: MessageRole, text: string): Promise<Result<void>>;
  getMessages(sessionId: string): Promise<Result<Message[]>>;
  clearMessages(sessionId: string): Promise<Result<void>>;
  replaceMessages(sessionId: string, messages: Message[]): Promise<Result<void>>;
  archiveMessages(sessionId: string, messages: Message[]): Promise<Result<void>>;
  setTitle(sessionId: string, title: string): Promise<Result<void>>;
}

function snapshot(session: ChatSession): ChatSession {
  return {
    ...session,
    messages: [...session.messages],
    archivedMessages: [...session.archivedMessages],
    compressionConfig: { ...session.compressionConfig },
    metadata: { ...session.metadata },
  };
}

export class InMemorySessionRepository implements SessionRepository {
  protected readonly sessions = new Map<string, ChatSession>();

  async createSession(providerId: ProviderType, options: CreateSessionOptions = {}): Promise<Result<ChatSession>> {
    const now = Date.now();
    const session: ChatSession = {
      id: uuidv4(),
      providerId,
      title: options.title,
      scheduledTaskId: options.scheduledTaskId,
      messages: [],
      archivedMessages: [],
      compressionConfig: { ...(options.compressionConfig ?? DEFAULT_COMPRESSION_CONFIG) },
      compressionCount: 0,
      createdAt: now,
      lastAccessedAt: now,
      metadata: { ...options.metadata },
    };
    this.sessions.set(session.id, session);
    return ok(snapshot(session));
  }

  async getSession(sessionId: string): Promise<Result<ChatSession>> {
    return this.withSession(sessionId, (session) => {
      session.lastAccessedAt = Date.now();
      return snapshot(session);
    });
  }

  async listSessions(): Promise<Result<ChatSession[]>> {
    const sessions = [...this.sessions.values()].sort((a, b) => b.lastAccessedAt - a.lastAccessedAt);
    return ok(sessions.map(snapshot));
  }

  async updateSession(session: ChatSession): Promise<Result<void>> {
    return this.withSession(session.id, () => {
      this.sessions.set(session.id, { ...snapshot(session), lastAccessedAt: Date.now() });
    });
  }

  async deleteSession(sessionId: string): Promise<Result<void>> {
    return this.withSession(sessionId, () => {
      this.sessions.delete(sessionId);
    });
  }

  async addMessage(sessionId: string, message: Message): Promise<Result<void>> {
    return this.withSession(sessionId, (session) => {
      session.messages.push(message);
      session.lastAccessedAt = Date.now();
    });
  }

  async appendMessage(sessionId: string, role: MessageRole, text: string): Promise<Result<void>> {
    return this.addMessage(sessionId, textMessage(role, text));
  }

  async getMessages(sessionId: string): Promise<Result<Message[]>> {
    return this.withSession(sessionId, (session) => [...session.messages]);
  }

  async clearMessages(sessionId: string): Promise<Result<void>> {
    return this.withSession(sessionId, (session) => {
      session.messages = [];
    });
  }

  async replaceMessages(sessionId: string, messages: Message[]): Promise<Result<void>> {
    return this.withSession(sessionId, (session) => {
      session.messages = [...messages];
    });
  }

  async archiveMessages(sessionId: string, messages: Message[]): Promise<Result<void>> {
    return this.withSession(sessionId, (session) => {
      session.archivedMessages.push(...messages);
    });
  }

  async setTitle(sessionId: string, title: string): Promise<Result<void>> {
    return this.withSession(sessionId, (session) => {
      session.title = title;
    });
  }

  private withSession<T>(sessionId: string, fn: (session: ChatSession) => T): Result<T> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return err(new NotFoundError(`Session not found: ${sessionId}`));
    }
    return ok(fn(session));
  }
}
