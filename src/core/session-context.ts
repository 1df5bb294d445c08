/**
 * Session Context
 *
 * Per-session state owned by one MCP session. A stdio process is one
 * session; every HTTP session gets its own instance.
 */

import { randomUUID } from 'crypto';

export class SessionContext {
  readonly sessionId: string;
  private lastTouchedReminderId: string | null = null;
  private closed = false;

  constructor(sessionId: string = randomUUID()) {
    this.sessionId = sessionId;
  }

  /**
   * Most recent reminder created or mutated in this session
   */
  getLastTouchedReminderId(): string | null {
    return this.lastTouchedReminderId;
  }

  rememberReminder(id: string): void {
    if (this.closed) {
      return;
    }
    this.lastTouchedReminderId = id;
  }

  isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
    this.lastTouchedReminderId = null;
  }
}
