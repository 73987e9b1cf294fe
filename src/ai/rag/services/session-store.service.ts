import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { RagConfig } from '../../../config/rag.config';

export interface ConversationTurn {
  user: string;
  assistant: string;
}

/**
 * In-memory conversation history, keyed by session id. Only the most recent
 * `rag.maxHistory` turns of each session are kept.
 */
@Injectable()
export class SessionStoreService implements OnModuleDestroy {
  private readonly logger = new Logger(SessionStoreService.name);
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly maxHistory: number;

  constructor(private readonly configService: ConfigService) {
    this.maxHistory = this.configService.getOrThrow<RagConfig>('rag').maxHistory;
  }

  createSession(): string {
    const sessionId = `session_${randomUUID()}`;
    this.logger.debug(`🆕 Created session ${sessionId}`);
    return sessionId;
  }

  getHistory(sessionId: string): string | null {
    const turns = this.sessions.get(sessionId);
    if (!turns || turns.length === 0) {
      return null;
    }

    return turns
      .map((turn) => `User: ${turn.user}\nAssistant: ${turn.assistant}`)
      .join('\n');
  }

  addExchange(sessionId: string, user: string, assistant: string): void {
    let turns = this.sessions.get(sessionId);
    if (!turns) {
      turns = [];
      this.sessions.set(sessionId, turns);
    }

    turns.push({ user, assistant });
    if (turns.length > this.maxHistory) {
      turns.splice(0, turns.length - this.maxHistory);
    }

    this.logger.debug(
      `📝 Session ${sessionId} now holds ${turns.length} turn(s)`,
    );
  }

  clearSession(sessionId: string): void {
    if (this.sessions.delete(sessionId)) {
      this.logger.debug(`🗑️ Cleared session ${sessionId}`);
    }
  }

  /**
   * Run `task` once every task queued earlier for the same session has
   * settled. Tasks for different sessions run independently.
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    // A failed predecessor must not block the queue
    const current = previous.then(task, task);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(sessionId, tail);

    try {
      return await current;
    } finally {
      if (this.queues.get(sessionId) === tail) {
        this.queues.delete(sessionId);
      }
    }
  }

  onModuleDestroy(): void {
    this.logger.log(`Dropping ${this.sessions.size} session(s)`);
    this.sessions.clear();
    this.queues.clear();
  }
}
