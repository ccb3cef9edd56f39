import winston from 'winston';
import { createLogger, logger } from '../../../src/server/utils/logger';

function render(target: winston.Logger, info: winston.Logform.TransformableInfo): string {
  const result = target.transports[0]?.format?.transform({ ...info }, {});
  if (typeof result !== 'object') {
    throw new Error('format dropped the entry');
  }
  const line = result[Symbol.for('message')];
  return typeof line === 'string' ? line : '';
}

describe('logger', () => {
  it('uses the configured level and stays silent under test', () => {
    expect(logger.level).toBe('error');
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]?.silent).toBe(true);
  });

  it('writes to the console outside of tests', () => {
    const created = createLogger({ level: 'debug', format: 'json', environment: 'development' });
    expect(created.level).toBe('debug');
    expect(created.transports[0]?.silent).toBe(false);
  });

  it('renders JSON lines with flattened errors', () => {
    const created = createLogger({ level: 'info', format: 'json', environment: 'production' });
    const line = render(created, { level: 'info', message: 'replayed', moves: 5, error: new Error('boom') });
    const parsed: unknown = JSON.parse(line);

    expect(parsed).toMatchObject({
      level: 'info',
      message: 'replayed',
      moves: 5,
      error: { message: 'boom', name: 'Error' },
    });
    expect(parsed).toHaveProperty('timestamp');
  });

  it('renders a readable line without service metadata', () => {
    const created = createLogger({ level: 'info', format: 'pretty', environment: 'development' });
    const line = render(created, {
      level: 'info',
      message: 'exploring',
      service: 'shogi-engine',
      environment: 'development',
      depth: 2,
    });

    expect(line).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} .*info.*: exploring \{"depth":2\}$/);
  });
});
