/**
 * Authentication event emitter for audit logging and monitoring
 * Events are fire-and-forget to avoid blocking the authentication flow
 */
import { logger } from '@taskhub/observability';

export type AuthEventType =
  | 'user.registered'
  | 'user.login.success'
  | 'user.login.failed'
  | 'user.password_changed'
  | 'token.refreshed'
  | 'token.auth_failed';

/**
 * Base authentication event structure
 */
export interface AuthEvent {
  type: AuthEventType;
  userId?: number;
  email?: string;
  ip?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export type AuthEventInput = Omit<AuthEvent, 'timestamp'>;

export type AuthEventHandler = (event: AuthEvent) => void | Promise<void>;

/**
 * Anything that can receive auth events (the emitter itself, or a test double)
 */
export interface AuthEventSink {
  emit(event: AuthEventInput): void;
}

export class AuthEventEmitter implements AuthEventSink {
  private handlers: AuthEventHandler[] = [];

  on(handler: AuthEventHandler) {
    this.handlers.push(handler);
  }

  emit(event: AuthEventInput) {
    const fullEvent: AuthEvent = {
      ...event,
      timestamp: new Date(),
    };

    // Fire and forget - don't block auth flow
    const pending = this.handlers.map((handler) =>
      Promise.resolve().then(() => handler(fullEvent))
    );
    void Promise.allSettled(pending).then((results) => {
      for (const result of results) {
        if (result.status === 'rejected') {
          logger.error({ err: result.reason, eventType: fullEvent.type }, 'Auth event handler error');
        }
      }
    });
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}

export const authEvents = new AuthEventEmitter();
