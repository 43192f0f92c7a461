/**
 * Session Lifecycle Manager for the assistant gateway.
 *
 * Runs the background expiry sweep: every `sweepInterval`, sessions idle
 * longer than `sessionTimeout` are ended. This is the only place sessions
 * are removed without a client request.
 */
import { EventEmitter } from 'events';
import type { SessionManager } from './SessionManager.js';
import { gatewayLogs } from '../logs/index.js';
import { errorMessage } from '../monitoring/ErrorRegistry.js';

export interface SessionLifecycleConfig {
  /** Idle time before a session expires, in milliseconds (default: 60 minutes) */
  sessionTimeout: number;
  /** Sweep interval in milliseconds (default: 5 minutes) */
  sweepInterval: number;
}

export interface SessionLifecycleEvents {
  sessionsExpired: [{ count: number; sessionIds: string[] }];
  sweepError: [{ sessionId: string; error: string }];
}

const DEFAULT_LIFECYCLE_CONFIG: SessionLifecycleConfig = {
  sessionTimeout: 60 * 60 * 1000, // 60 minutes
  sweepInterval: 5 * 60 * 1000, // 5 minutes
};

export class SessionLifecycleManager extends EventEmitter<SessionLifecycleEvents> {
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private config: SessionLifecycleConfig;

  constructor(
    private sessionManager: SessionManager,
    config: Partial<SessionLifecycleConfig> = {},
  ) {
    super();
    this.config = { ...DEFAULT_LIFECYCLE_CONFIG, ...config };
  }

  getConfig(): SessionLifecycleConfig {
    return { ...this.config };
  }

  isRunning(): boolean {
    return this.sweepTimer !== null;
  }

  /**
   * Begin periodic expiry sweeps.
   */
  start(): void {
    if (this.sweepTimer) return; // Already running

    this.sweepTimer = setInterval(() => {
      this.cleanupExpiredSessions().catch((err: unknown) => {
        gatewayLogs.error('SessionLifecycle', `Error in session cleanup: ${errorMessage(err)}`);
      });
    }, this.config.sweepInterval);
    this.sweepTimer.unref();

    gatewayLogs.info('SessionLifecycle', 'Session expiry sweep started', {
      sessionTimeoutMs: this.config.sessionTimeout,
      sweepIntervalMs: this.config.sweepInterval,
    });
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
      gatewayLogs.info('SessionLifecycle', 'Session expiry sweep stopped');
    }
  }

  /**
   * End every session idle longer than the timeout.
   * A failure ending one session is logged and the sweep moves on.
   * @returns Ids of the sessions that were ended
   */
  async cleanupExpiredSessions(): Promise<string[]> {
    const now = Date.now();
    const expired = this.sessionManager
      .listSessions()
      .filter((s) => now - s.lastActivityAt.getTime() > this.config.sessionTimeout)
      .map((s) => s.id);

    const ended: string[] = [];
    for (const sessionId of expired) {
      try {
        // Re-check under the current clock: the session may have been touched meanwhile.
        const session = this.sessionManager.peekSession(sessionId);
        if (!session || Date.now() - session.lastActivityAt.getTime() <= this.config.sessionTimeout) {
          continue;
        }
        if (await this.sessionManager.endSession(sessionId)) {
          ended.push(sessionId);
          gatewayLogs.info('SessionLifecycle', `Cleaned up expired session: ${sessionId}`);
        }
      } catch (err) {
        const error = errorMessage(err);
        gatewayLogs.error('SessionLifecycle', `Failed to expire session ${sessionId}: ${error}`);
        this.emit('sweepError', { sessionId, error });
      }
    }

    if (ended.length > 0) {
      this.emit('sessionsExpired', { count: ended.length, sessionIds: ended });
    }

    return ended;
  }
}
