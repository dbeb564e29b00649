import { describe, expect, it } from 'vitest';
import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { Logger } from '../src/utils/logger.js';

describe('logger', () => {
  it('filters console output by level', () => {
    const lines: string[] = [];
    const logger = new Logger({ level: 'warn', sink: (l) => lines.push(l) });

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('rate limited', { reset: 60 });
    logger.error('boom');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z WARN  rate limited \{"reset":60\}$/);
    expect(lines[1]).toMatch(/Z ERROR boom$/);
  });

  it('writes JSON lines when asked', () => {
    const lines: string[] = [];
    new Logger({ json: true, sink: (l) => lines.push(l) }).info('saved', { file: 'x.csv' });

    const parsed = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(parsed).toMatchObject({ level: 'info', message: 'saved', data: { file: 'x.csv' } });
  });

  it('records every level in the log file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'prt-log-'));
    const filePath = join(dir, 'logs', 'collector.log');
    const logger = new Logger({ level: 'error', filePath, sink: () => {} });

    logger.debug('GET /orgs/o/repos');
    logger.info('done');

    const content = await readFile(filePath, 'utf8');
    const lines = content.trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/DEBUG GET \/orgs\/o\/repos$/);
    expect(lines[1]).toMatch(/INFO  done$/);
  });
});
