import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger } from './logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('writes errors as JSON lines carrying child bindings', () => {
    const error_spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logger.child({ component: 'ingestion' }).child({ topic: 'fire station' }).error('commit failed', { fact_id: 4 });

    expect(error_spy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(error_spy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'error',
      message: 'commit failed',
      component: 'ingestion',
      topic: 'fire station',
      fact_id: 4,
    });
  });

  it('drops entries below the configured level', () => {
    const log_spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logger.info('request completed');
    logger.warn('request rejected');

    expect(log_spy).not.toHaveBeenCalled();
  });
});
