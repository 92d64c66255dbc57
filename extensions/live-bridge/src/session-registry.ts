/**
 * Session Registry
 *
 * Tracks live bridge sessions and enforces the concurrency limit. Admission
 * is two-phase: reserve() claims a slot before the upstream is dialled, and
 * the reservation is either committed with the running session or released.
 */

import type { Logger } from "./bridge.js";
import type { BridgeSession } from "./session-bridge.js";
import type { EndReason, SessionSnapshot } from "./types.js";
import { CapacityExceededError } from "./errors.js";

/**
 * A claimed slot. Exactly one of commit() or release() takes effect.
 */
export interface Reservation {
  readonly id: string;
  commit(session: BridgeSession): void;
  release(): void;
}

export interface SessionRegistryOptions {
  /** Max sessions, pending reservations included (0 rejects everything) */
  maxSessions: number;
  logger?: Logger;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, BridgeSession>();
  private readonly pending = new Set<string>();
  private readonly maxSessions: number;
  private readonly logger?: Logger;

  constructor(options: SessionRegistryOptions) {
    if (!Number.isInteger(options.maxSessions) || options.maxSessions < 0) {
      throw new Error(`maxSessions must be a non-negative integer, got ${options.maxSessions}`);
    }
    this.maxSessions = options.maxSessions;
    this.logger = options.logger;
  }

  /**
   * Claim a slot for a session about to be opened.
   *
   * @throws CapacityExceededError when live plus pending sessions reach the limit
   */
  reserve(id: string): Reservation {
    if (this.sessions.has(id) || this.pending.has(id)) {
      throw new Error(`Session id already in use: ${id}`);
    }
    if (this.sessions.size + this.pending.size >= this.maxSessions) {
      this.logger?.warn(`[SessionRegistry] Rejecting ${id}: limit ${this.maxSessions} reached`);
      throw new CapacityExceededError(this.maxSessions);
    }
    this.pending.add(id);

    let settled = false;
    return {
      id,
      commit: (session: BridgeSession) => {
        if (settled) return;
        settled = true;
        this.pending.delete(id);
        if (session.id !== id) {
          throw new Error(`Reservation ${id} committed with session ${session.id}`);
        }
        this.sessions.set(id, session);
        this.logger?.debug(`[SessionRegistry] Registered ${id} (live: ${this.sessions.size})`);
      },
      release: () => {
        if (settled) return;
        settled = true;
        this.pending.delete(id);
      },
    };
  }

  /**
   * Admit a session directly. Equivalent to reserve() followed by commit().
   */
  register(session: BridgeSession): void {
    this.reserve(session.id).commit(session);
  }

  /**
   * Remove a session. Removing an unknown id is a no-op.
   */
  unregister(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) {
      this.logger?.debug(`[SessionRegistry] Unregistered ${id} (live: ${this.sessions.size})`);
    }
    return removed;
  }

  get(id: string): BridgeSession | undefined {
    return this.sessions.get(id);
  }

  /** Live sessions, not counting pending reservations */
  size(): number {
    return this.sessions.size;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  getMaxSessions(): number {
    return this.maxSessions;
  }

  snapshots(): SessionSnapshot[] {
    return [...this.sessions.values()].map((session) => session.getSnapshot());
  }

  /**
   * Signal every live session to shut down and wait for all of them to close.
   *
   * Works on a copy, since sessions unregister themselves while closing.
   */
  async shutdownAll(reason: EndReason = "server-shutdown"): Promise<SessionSnapshot[]> {
    const sessions = [...this.sessions.values()];
    if (sessions.length === 0) {
      return [];
    }

    this.logger?.info(`[SessionRegistry] Shutting down ${sessions.length} session(s)`);
    for (const session of sessions) {
      session.shutdown(reason);
    }
    return Promise.all(sessions.map((session) => session.run()));
  }
}
