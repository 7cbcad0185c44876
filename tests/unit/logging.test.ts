import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { getLogger, __resetLoggerForTests, __enableTestLogCollector } from '../../src/utils/logging.js';

const initialLevel = process.env.LOG_LEVEL;

describe('logging singleton', () => {
  beforeEach(() => {
    __resetLoggerForTests();
  });

  afterAll(() => {
    if (initialLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = initialLevel;
    __resetLoggerForTests();
  });

  it('returns same instance', () => {
    const a = getLogger();
    const b = getLogger();
    expect(a).toBe(b);
  });

  it('honors LOG_LEVEL env', () => {
    process.env.LOG_LEVEL = 'debug';
    __resetLoggerForTests();
    const l = getLogger();
    expect(l.level).toBe('debug');
  });

  it('masks credentials but keeps tracking tokens', () => {
    const logs = __enableTestLogCollector('info');
    getLogger().info(
      { headers: { authorization: 'Bearer test-secret' }, token: 'pv-abcd1234-000001-0f1e2d3c' },
      'request sent',
    );
    expect(logs).toHaveLength(1);
    const entry = JSON.parse(logs[0]);
    expect(entry.headers.authorization).toBe('***');
    expect(entry.token).toBe('pv-abcd1234-000001-0f1e2d3c');
    expect(entry.msg).toBe('request sent');
  });
});
