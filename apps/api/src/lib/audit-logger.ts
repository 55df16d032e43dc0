import { type AuthEvent, type AuthEventEmitter, authEvents } from '@taskhub/auth';
import { type Logger, logger } from '@taskhub/observability';

/**
 * Initialize audit logging for authentication events
 * Logs all authentication events to structured logging service
 * Sensitive values are redacted by the logger
 */
export function initializeAuditLogging(
  emitter: Pick<AuthEventEmitter, 'on'> = authEvents,
  log: Logger = logger
) {
  emitter.on(createAuditHandler(log));
  log.info('Audit logging initialized for authentication events');
}

export function createAuditHandler(log: Logger) {
  return (event: AuthEvent) => {
    const { type, userId, email, ip, timestamp, metadata } = event;

    const logEntry = {
      event: type,
      userId: userId ?? 'unknown',
      email: email ?? 'unknown',
      ip: ip ?? 'unknown',
      timestamp: timestamp.toISOString(),
      success: !type.endsWith('failed'),
      ...(metadata && { metadata }),
    };

    switch (type) {
      case 'user.registered':
        log.info(logEntry, 'User registered successfully');
        break;

      case 'user.login.success':
        log.info(logEntry, 'User login successful');
        break;

      case 'user.login.failed':
        log.warn(logEntry, 'User login failed');
        break;

      case 'user.password_changed':
        log.info(logEntry, 'User password changed');
        break;

      case 'token.refreshed':
        log.info(logEntry, 'Access token refreshed');
        break;

      case 'token.auth_failed':
        log.warn(logEntry, 'Token authentication failed');
        break;
    }
  };
}
