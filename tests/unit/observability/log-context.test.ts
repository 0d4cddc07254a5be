import pino from 'pino';

import {
  getCorrelationId,
  getLogContext,
  logContextMixin,
  runWithContext,
} from '../../../src/observability/log-context';

describe('log context', () => {
  const jobScope = { correlationId: 'job_1', chargeId: 'chg_1', jobId: 'job_1' };

  it('is empty outside any scope', () => {
    expect(getLogContext()).toBeUndefined();
    expect(getCorrelationId()).toBeUndefined();
    expect(logContextMixin()).toEqual({});
  });

  it('follows a job across awaits', async () => {
    const seen = await runWithContext(jobScope, async () => {
      await Promise.resolve();
      return { context: getLogContext(), correlationId: getCorrelationId() };
    });

    expect(seen).toEqual({ context: jobScope, correlationId: 'job_1' });
    expect(getLogContext()).toBeUndefined();
  });

  it('stamps the scope on every line of a pino logger', () => {
    const lines: string[] = [];
    const log = pino(
      { base: undefined, timestamp: false, mixin: logContextMixin },
      { write: (line: string) => lines.push(line) }
    );

    runWithContext(jobScope, () => {
      log.info('Processing settlement job');
      log.info({ chargeId: 'chg_2' }, 'Explicit field');
    });
    log.info('Outside');

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { level: 30, correlationId: 'job_1', chargeId: 'chg_1', jobId: 'job_1', msg: 'Processing settlement job' },
      { level: 30, correlationId: 'job_1', chargeId: 'chg_2', jobId: 'job_1', msg: 'Explicit field' },
      { level: 30, msg: 'Outside' },
    ]);
  });
});
