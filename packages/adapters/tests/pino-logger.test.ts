import { describe, expect, it } from 'vitest';
import { createEngineLogger, PinoLogger } from '../src/index';

function captureLogger(level: 'debug' | 'info' = 'debug') {
  const lines: string[] = [];
  const logger = new PinoLogger({
    level,
    name: 'weave-test',
    destination: { write: (line: string) => { lines.push(line); } }
  });
  const entries = (): Array<Record<string, unknown>> => lines.map((line) => JSON.parse(line));
  return { logger, entries };
}

describe('PinoLogger', () => {
  it('writes structured lines with child bindings and filters by level', () => {
    const { logger, entries } = captureLogger('info');
    logger.child({ component: 'StateStore' }).info({ executionId: 'exec-1' }, 'State saved');
    logger.debug('hidden');
    logger.warn('plain warning');

    const [saved, warned] = entries();
    expect(entries()).toHaveLength(2);
    expect(saved).toMatchObject({
      level: 30,
      name: 'weave-test',
      component: 'StateStore',
      executionId: 'exec-1',
      msg: 'State saved'
    });
    expect(warned).toMatchObject({ level: 40, msg: 'plain warning' });
  });

  it('redacts advisor credentials and serializes errors', () => {
    const { logger, entries } = captureLogger();
    logger.info({ advisor: { apiKey: 'test-secret', model: 'gpt-test' } }, 'Advisor configured');
    logger.error({ err: new Error('boom') }, 'Node failed');

    const [configured, failed] = entries();
    expect(configured.advisor).toEqual({ apiKey: '[redacted]', model: 'gpt-test' });
    expect(failed.err).toMatchObject({ type: 'Error', message: 'boom' });
    expect(failed.level).toBe(50);
  });

  it('builds the engine logger from the logging config', () => {
    const logger = createEngineLogger({ level: 'warn', prettyPrint: false });
    expect(logger.level).toBe('warn');
  });
});
