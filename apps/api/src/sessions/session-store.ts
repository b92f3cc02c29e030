import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { CollisionError, NotFoundError } from '../common/errors';
import type { NewQueryRecord, QueryRecord, SessionInfo } from './session.types';

export interface SessionStoreOptions {
  /** Idle time after which a session is forgotten. */
  ttlMs?: number;
  /** Live session cap; the least recently active session is evicted past it. */
  maxSessions?: number;
  maxCollisionRetries?: number;
  generateId?: () => string;
  now?: () => number;
}

interface SessionEntry {
  id: string;
  createdAt: number;
  lastActivity: number;
  records: QueryRecord[];
}

const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;
const DEFAULT_MAX_SESSIONS = 10_000;
const DEFAULT_COLLISION_RETRIES = 5;

/**
 * In-memory per-session query history.
 *
 * Every method is synchronous, so on the event loop each append or snapshot
 * completes before any other caller runs; no additional locking is needed.
 * Map insertion order doubles as recency order: touching a session moves it
 * to the end, and eviction takes from the front.
 */
export class SessionStore {
  private readonly logger = new Logger(SessionStore.name);
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly ttlMs: number;
  private readonly maxSessions: number;
  private readonly maxCollisionRetries: number;
  private readonly generateId: () => string;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.maxCollisionRetries = options.maxCollisionRetries ?? DEFAULT_COLLISION_RETRIES;
    this.generateId = options.generateId ?? (() => uuidv4());
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    this.evictExpired();
    return this.sessions.size;
  }

  createSession(): SessionInfo {
    this.evictExpired();
    const id = this.allocateId();
    const ts = this.now();
    this.sessions.set(id, { id, createdAt: ts, lastActivity: ts, records: [] });
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next().value;
      if (oldest === undefined) break;
      this.sessions.delete(oldest);
      this.logger.warn(`Session cap ${this.maxSessions} reached, evicted ${oldest}`);
    }
    return { id, createdAt: new Date(ts).toISOString() };
  }

  has(sessionId: string): boolean {
    return this.lookup(sessionId) !== undefined;
  }

  append(sessionId: string, record: NewQueryRecord): QueryRecord {
    const entry = this.require(sessionId);
    const stored: QueryRecord = Object.freeze({
      ...record,
      ...(record.result
        ? {
            result: Object.freeze({ ...record.result, columns: Object.freeze([...record.result.columns]) }),
          }
        : {}),
      ...(record.error ? { error: Object.freeze({ ...record.error }) } : {}),
      timestamp: new Date(this.now()).toISOString(),
    });
    entry.records.push(stored);
    this.touch(entry);
    return stored;
  }

  /** Point-in-time copy; later appends never show up in a returned array. */
  history(sessionId: string): readonly QueryRecord[] {
    const entry = this.require(sessionId);
    this.touch(entry);
    return Object.freeze(entry.records.slice());
  }

  private allocateId(): string {
    for (let attempt = 1; attempt <= this.maxCollisionRetries; attempt++) {
      const id = this.generateId();
      if (!this.sessions.has(id)) return id;
      this.logger.warn(`Session id collision (attempt ${attempt}/${this.maxCollisionRetries})`);
    }
    throw new CollisionError(
      `Could not allocate a unique session id after ${this.maxCollisionRetries} attempts.`,
    );
  }

  private require(sessionId: string): SessionEntry {
    const entry = this.lookup(sessionId);
    if (!entry) throw new NotFoundError(`Session ${sessionId} not found.`);
    return entry;
  }

  private lookup(sessionId: string): SessionEntry | undefined {
    const entry = this.sessions.get(sessionId);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return entry;
  }

  private touch(entry: SessionEntry): void {
    entry.lastActivity = this.now();
    this.sessions.delete(entry.id);
    this.sessions.set(entry.id, entry);
  }

  private isExpired(entry: SessionEntry): boolean {
    return this.now() - entry.lastActivity > this.ttlMs;
  }

  private evictExpired(): void {
    for (const entry of this.sessions.values()) {
      // recency order: once one session is live, every later one is too
      if (!this.isExpired(entry)) break;
      this.sessions.delete(entry.id);
    }
  }
}
