/**
 * Session Context Unit Tests
 */

import { SessionContext } from '../../src/core/session-context.js';

describe('SessionContext', () => {
  it('should start without a last touched reminder', () => {
    const session = new SessionContext('s1');

    expect(session.sessionId).toBe('s1');
    expect(session.getLastTouchedReminderId()).toBeNull();
  });

  it('should remember the most recent reminder', () => {
    const session = new SessionContext();

    session.rememberReminder('R1');
    session.rememberReminder('R2');

    expect(session.getLastTouchedReminderId()).toBe('R2');
  });

  it('should keep sessions independent', () => {
    const first = new SessionContext();
    const second = new SessionContext();

    first.rememberReminder('R1');

    expect(second.getLastTouchedReminderId()).toBeNull();
    expect(first.sessionId).not.toBe(second.sessionId);
  });

  it('should forget and ignore reminders once closed', () => {
    const session = new SessionContext();
    session.rememberReminder('R1');

    session.close();
    session.rememberReminder('R2');

    expect(session.isClosed()).toBe(true);
    expect(session.getLastTouchedReminderId()).toBeNull();
  });
});
