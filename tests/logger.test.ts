import { describe, it, expect } from 'vitest';
import { logDestination } from '../src/config/logger.js';

describe('logger', () => {
  it('should write plain JSON logs to stderr', () => {
    expect(logDestination({ NODE_ENV: 'production', LOG_PRETTY: 'false' })).toMatchObject({ fd: 2 });
    expect(logDestination({ NODE_ENV: 'test' })).toMatchObject({ fd: 2 });
  });

  it('should leave the destination to pino-pretty when pretty output is on', () => {
    expect(logDestination({ NODE_ENV: 'production' })).toBeUndefined();
  });
});
