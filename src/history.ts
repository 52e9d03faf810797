import { randomUUID } from "node:crypto";
import { categorizeGlucose, glucoseStatus } from "./categorize";
import type { HistoryEntry, PatientInput, PredictionResult } from "./types";

/** How many entries the page shows. The store itself keeps everything. */
export const HISTORY_DISPLAY_LIMIT = 5;

/**
 * Ordered log of one session's predictions.
 *
 * Append-only apart from `clear()`; no deduplication and no cap.
 */
export class HistoryStore {
  private entries: HistoryEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  append(entry: HistoryEntry): void {
    this.entries.push(entry);
  }

  /**
   * At most the last `n` entries, newest first.
   */
  recent(n: number): HistoryEntry[] {
    const count =
      n === Number.POSITIVE_INFINITY ? this.entries.length : Math.floor(n);
    if (!Number.isFinite(count) || count <= 0) return [];
    return this.entries.slice(-count).reverse();
  }

  /** Oldest first. */
  all(): HistoryEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

function freezePair(
  pair: readonly [number, number]
): readonly [number, number] {
  const copy: readonly [number, number] = [pair[0], pair[1]];
  Object.freeze(copy);
  return copy;
}

/**
 * Builds the immutable record for one prediction.
 */
export function createHistoryEntry(
  input: PatientInput,
  result: PredictionResult,
  now: Date = new Date(),
  id: string = randomUUID()
): HistoryEntry {
  return Object.freeze({
    id,
    createdAt: now.toISOString(),
    input: Object.freeze({ ...input }),
    result: Object.freeze({
      ...result,
      probabilities: freezePair(result.probabilities),
    }),
    category: Object.freeze(glucoseStatus(input.glucose)),
    detailedCategory: Object.freeze(categorizeGlucose(input.glucose)),
  });
}

/**
 * Per-user state, created by the caller and handed to whatever needs it.
 */
export type SessionContext = {
  readonly id: string;
  readonly history: HistoryStore;
  readonly createdAt: number;
  lastSeenAt: number;
};

export function createSession(
  id: string = randomUUID(),
  now: number = Date.now()
): SessionContext {
  return { id, history: new HistoryStore(), createdAt: now, lastSeenAt: now };
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9-]{8,64}$/;

export function isValidSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}

/**
 * Keeps each browser session's context apart on the server.
 *
 * A session idle for longer than `ttlMs` has ended; its history is dropped.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionContext>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Returns the live session for `id`, or a fresh one when the id is
   * missing, malformed, unknown, or expired.
   */
  resolve(id: string | null | undefined): SessionContext {
    const now = this.clock();
    this.prune(now);

    if (id && isValidSessionId(id)) {
      const existing = this.sessions.get(id);
      if (existing) {
        existing.lastSeenAt = now;
        return existing;
      }
    }

    const session = createSession(randomUUID(), now);
    this.sessions.set(session.id, session);
    return session;
  }

  prune(now: number = this.clock()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt > this.ttlMs) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
