/**
 * Outreach Session Store
 *
 * Persists the loop's session state per (app, user). The CLI uses the SQLite
 * store against a throwaway database file.
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { runOutreachLoop, type OutreachDeps, type OutreachOptions } from './generate-outreach-email';
import type { OutreachState } from './types';

// ============================================================================
// Types
// ============================================================================

export interface OutreachSession {
  readonly id: string;
  readonly appName: string;
  readonly userId: string;
  readonly state: OutreachState;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface OutreachSessionStore {
  createSession(appName: string, userId: string, state: OutreachState): Promise<OutreachSession>;
  /** Oldest first */
  listSessions(appName: string, userId: string): Promise<OutreachSession[]>;
  getSession(appName: string, userId: string, id: string): Promise<OutreachSession | null>;
  /** Shallow-merges `patch` into the stored state. Null when the session does not exist. */
  updateState(id: string, patch: Partial<OutreachState>): Promise<OutreachSession | null>;
  deleteSession(id: string): Promise<boolean>;
}

const outreachStateSchema = z.object({
  user_name: z.string(),
  recipient_info: z.string(),
  character: z.record(z.unknown()),
  email: z.string().optional(),
  review_feedback: z.string(),
  review_status: z.enum(['pass', 'fail']).optional(),
});

// ============================================================================
// In-Memory Store
// ============================================================================

export class InMemorySessionStore implements OutreachSessionStore {
  // Map iteration order is insertion order, which listSessions relies on
  private readonly sessions = new Map<string, OutreachSession>();

  constructor(private readonly now: () => number = Date.now) {}

  async createSession(appName: string, userId: string, state: OutreachState): Promise<OutreachSession> {
    const timestamp = this.now();
    const session: OutreachSession = {
      id: randomUUID(),
      appName,
      userId,
      state,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  async listSessions(appName: string, userId: string): Promise<OutreachSession[]> {
    return [...this.sessions.values()].filter((s) => s.appName === appName && s.userId === userId);
  }

  async getSession(appName: string, userId: string, id: string): Promise<OutreachSession | null> {
    const session = this.sessions.get(id);
    if (!session || session.appName !== appName || session.userId !== userId) {
      return null;
    }
    return session;
  }

  async updateState(id: string, patch: Partial<OutreachState>): Promise<OutreachSession | null> {
    const session = this.sessions.get(id);
    if (!session) return null;
    const updated: OutreachSession = {
      ...session,
      state: { ...session.state, ...patch },
      updatedAt: this.now(),
    };
    this.sessions.set(id, updated);
    return updated;
  }

  async deleteSession(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }
}

// ============================================================================
// SQLite Store
// ============================================================================

interface SessionRow {
  readonly id: string;
  readonly appName: string;
  readonly userId: string;
  readonly state: string;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/**
 * better-sqlite3 backed store with one table holding the state as JSON.
 *
 * @example
 * const store = new SqliteSessionStore('outreach_sessions.db');
 * try { ... } finally { store.close(); }
 */
export class SqliteSessionStore implements OutreachSessionStore {
  private readonly db: Database.Database;

  constructor(
    filename = ':memory:',
    private readonly now: () => number = Date.now
  ) {
    this.db = new Database(filename);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS outreach_sessions (
        id TEXT PRIMARY KEY,
        appName TEXT NOT NULL,
        userId TEXT NOT NULL,
        state TEXT NOT NULL,
        createdAt INTEGER NOT NULL,
        updatedAt INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_outreach_sessions_owner ON outreach_sessions(appName, userId);
    `);
  }

  private toSession(row: SessionRow): OutreachSession {
    const parsed: unknown = JSON.parse(row.state);
    return {
      id: row.id,
      appName: row.appName,
      userId: row.userId,
      state: outreachStateSchema.parse(parsed),
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  private findRow(id: string): SessionRow | undefined {
    return this.db
      .prepare<[string], SessionRow>('SELECT * FROM outreach_sessions WHERE id = ?')
      .get(id);
  }

  async createSession(appName: string, userId: string, state: OutreachState): Promise<OutreachSession> {
    const timestamp = this.now();
    const row: SessionRow = {
      id: randomUUID(),
      appName,
      userId,
      state: JSON.stringify(state),
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.db
      .prepare<[SessionRow]>(
        `INSERT INTO outreach_sessions (id, appName, userId, state, createdAt, updatedAt)
         VALUES (@id, @appName, @userId, @state, @createdAt, @updatedAt)`
      )
      .run(row);
    return this.toSession(row);
  }

  async listSessions(appName: string, userId: string): Promise<OutreachSession[]> {
    const rows = this.db
      .prepare<[string, string], SessionRow>(
        'SELECT * FROM outreach_sessions WHERE appName = ? AND userId = ? ORDER BY createdAt ASC, rowid ASC'
      )
      .all(appName, userId);
    return rows.map((row) => this.toSession(row));
  }

  async getSession(appName: string, userId: string, id: string): Promise<OutreachSession | null> {
    const row = this.findRow(id);
    if (!row || row.appName !== appName || row.userId !== userId) {
      return null;
    }
    return this.toSession(row);
  }

  async updateState(id: string, patch: Partial<OutreachState>): Promise<OutreachSession | null> {
    const row = this.findRow(id);
    if (!row) return null;

    const current = this.toSession(row);
    const state: OutreachState = { ...current.state, ...patch };
    const updatedAt = this.now();
    this.db
      .prepare<[string, number, string]>('UPDATE outreach_sessions SET state = ?, updatedAt = ? WHERE id = ?')
      .run(JSON.stringify(state), updatedAt, id);

    return { ...current, state, updatedAt };
  }

  async deleteSession(id: string): Promise<boolean> {
    const result = this.db.prepare<[string]>('DELETE FROM outreach_sessions WHERE id = ?').run(id);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}

// ============================================================================
// Session Runner
// ============================================================================

export interface OutreachSessionRun {
  readonly sessionId: string;
  /** True when an existing session was continued */
  readonly continued: boolean;
  readonly approved: boolean;
  readonly iterations: number;
  /** Email read back from the stored state; null when none was stored */
  readonly email: string | null;
}

/**
 * Continues the user's first session (or creates one from `initialState`),
 * runs the loop and persists the final state.
 */
export async function runOutreachSession(
  store: OutreachSessionStore,
  appName: string,
  userId: string,
  initialState: OutreachState,
  deps?: OutreachDeps,
  options?: OutreachOptions & { readonly logger?: Logger }
): Promise<OutreachSessionRun> {
  const log = options?.logger ?? createPrefixedLogger('[Session]');

  const existing = await store.listSessions(appName, userId);
  const first = existing[0];
  let session: OutreachSession;
  if (first) {
    session = first;
    log.info(`Continuing session ${session.id}`);
  } else {
    session = await store.createSession(appName, userId, initialState);
    log.info('Created new session');
  }

  const result = await runOutreachLoop(session.state, deps, options);
  await store.updateState(session.id, result.finalState);

  const stored = await store.getSession(appName, userId, session.id);
  const email = stored?.state.email;

  return {
    sessionId: session.id,
    continued: first !== undefined,
    approved: result.approved,
    iterations: result.iterations,
    email: email !== undefined && email.length > 0 ? email : null,
  };
}
