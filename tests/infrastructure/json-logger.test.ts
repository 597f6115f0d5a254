import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { JsonLogger } from '../../src/infrastructure/services/json-logger.service.js';
import { makeTempDir, removeDir } from '../helpers/fakes.js';

describe('JsonLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('writes one JSON line per entry into a per-run file', async () => {
    const logDir = join(dir, 'logs');
    const logger = new JsonLogger(logDir, 'requests.jsonl');
    logger.init('run_test');

    logger.log({
      filePath: '/in/a.pdf',
      operation: 'processReferences',
      attempt: 1,
      request: { method: 'POST', url: 'http://localhost:8070/api/processReferences' },
      response: { statusCode: 503, latencyMs: 12, bodyLength: 0 },
      decision: 'retry',
    });
    logger.log({
      filePath: '/in/a.pdf',
      operation: 'processReferences',
      attempt: 2,
      request: { method: 'POST', url: 'http://localhost:8070/api/processReferences' },
      response: { statusCode: 200, latencyMs: 40, bodyLength: 7 },
      decision: 'accept',
    });
    await logger.close();

    const path = join(logDir, 'requests_run_test.jsonl');
    expect(logger.getPath()).toBe(path);
    const lines = readFileSync(path, 'utf-8').trim().split('\n').map((l) => JSON.parse(l));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ runId: 'run_test', attempt: 1, decision: 'retry' });
    expect(lines[1]).toMatchObject({ runId: 'run_test', attempt: 2, decision: 'accept' });
    expect(typeof lines[1].timestamp).toBe('string');
  });

  it('ignores entries logged before init or after close', async () => {
    const logger = new JsonLogger(dir, 'requests.jsonl');
    const entry = {
      filePath: '/in/a.pdf',
      operation: 'processHeaderDocument' as const,
      attempt: 1,
      request: { method: 'POST', url: 'u' },
      decision: 'fail' as const,
    };
    logger.log(entry);
    logger.init('r1');
    await logger.close();
    logger.log(entry);
    await logger.close();

    expect(readFileSync(join(dir, 'requests_r1.jsonl'), 'utf-8')).toBe('');
  });
});
