import { AuthEventEmitter } from '@taskhub/auth';
import { createLogger } from '@taskhub/observability';
import { createAuditHandler, initializeAuditLogging } from '../audit-logger.js';

function captureLogger() {
  const lines: unknown[] = [];
  const log = createLogger({ level: 'info' }, { write: (line: string) => lines.push(JSON.parse(line)) });
  return { log, lines };
}

describe('audit logger', () => {
  it('logs failed logins as warnings', () => {
    const { log, lines } = captureLogger();

    createAuditHandler(log)({
      type: 'user.login.failed',
      email: 'alice@example.com',
      timestamp: new Date('2025-01-01T00:00:00Z'),
      metadata: { reason: 'invalid_credentials' },
    });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: 'User login failed',
      event: 'user.login.failed',
      userId: 'unknown',
      email: 'alice@example.com',
      ip: 'unknown',
      timestamp: '2025-01-01T00:00:00.000Z',
      success: false,
      metadata: { reason: 'invalid_credentials' },
    });
  });

  it('logs registrations as info', () => {
    const { log, lines } = captureLogger();

    createAuditHandler(log)({
      type: 'user.registered',
      userId: 7,
      email: 'alice@example.com',
      ip: '203.0.113.7',
      timestamp: new Date('2025-01-01T00:00:00Z'),
    });

    expect(lines[0]).toMatchObject({
      level: 30,
      msg: 'User registered successfully',
      userId: 7,
      ip: '203.0.113.7',
      success: true,
    });
  });

  it('subscribes to the emitter', async () => {
    const { log, lines } = captureLogger();
    const emitter = new AuthEventEmitter();

    initializeAuditLogging(emitter, log);
    emitter.emit({ type: 'token.refreshed', userId: 3, metadata: { jti: 'abc' } });

    await vi.waitFor(() => expect(lines).toHaveLength(2));
    expect(lines[1]).toMatchObject({ msg: 'Access token refreshed', userId: 3 });
  });
});
