/**
 * Unit tests for FileLogger
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileLogger } from './FileLogger';

describe('FileLogger', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'file-logger-'));
  });

  afterEach(() => {
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('should append levelled lines to the daily log file', async () => {
    const logger = new FileLogger(logDir);
    logger.info('backend started', { pid: 42 });
    logger.debug('tick');
    await logger.close();

    const lines = fs.readFileSync(logger.files.log, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] backend started \{"pid":42\}$/);
    expect(lines[1]).toMatch(/\[DEBUG\] tick$/);
  });

  it('should copy errors into the error file', async () => {
    const logger = new FileLogger(logDir);
    logger.error('player failed');
    logger.warn('slow peers');
    await logger.close();

    expect(fs.readFileSync(logger.files.error, 'utf8')).toMatch(/\[ERROR\] player failed\n$/);
    expect(fs.readFileSync(logger.files.log, 'utf8')).toContain('[WARN] slow peers');
  });

  it('should ignore writes after close', async () => {
    const logger = new FileLogger(logDir);
    await logger.close();

    expect(() => logger.info('late')).not.toThrow();
  });
});
