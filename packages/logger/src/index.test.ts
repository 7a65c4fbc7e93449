import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterAll, afterEach, beforeEach, describe, expect, it } from 'vitest';

import { closeLogger, getLogFilePath, makeLogger } from './index';

const ORIGINAL_ENV = { ...process.env };
let logDir: string;

beforeEach(() => {
  process.env = { ...ORIGINAL_ENV };
  logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'beat-logger-'));
  process.env.LOG_DIR = logDir;
  process.env.LOG_LEVEL = 'warn';
});

afterEach(() => {
  closeLogger('svc-a');
  closeLogger('svc-b');
  fs.rmSync(logDir, { recursive: true, force: true });
});

afterAll(() => {
  process.env = ORIGINAL_ENV;
});

describe('logger', () => {
  it('reuses one logger per service name', () => {
    const first = makeLogger('svc-a');
    const second = makeLogger('svc-a');
    expect(second).toBe(first);
    expect(first.level).toBe('warn');
  });

  it('places the run file under the service directory', () => {
    makeLogger('svc-a');
    const filePath = getLogFilePath('svc-a');
    expect(filePath).not.toBeNull();
    expect(path.dirname(filePath ?? '')).toBe(path.join(logDir, 'svc-a'));
    expect(path.basename(filePath ?? '')).toMatch(/^run-.*\.log$/);
    expect(fs.existsSync(filePath ?? '')).toBe(true);
  });

  it('skips the file stream when LOG_TO_FILE is 0', () => {
    process.env.LOG_TO_FILE = '0';
    makeLogger('svc-b');
    expect(getLogFilePath('svc-b')).toBeNull();
    expect(fs.existsSync(path.join(logDir, 'svc-b'))).toBe(false);
  });

  it('falls back to info for unknown levels', () => {
    process.env.LOG_LEVEL = 'chatty';
    process.env.LOG_TO_FILE = '0';
    expect(makeLogger('svc-b').level).toBe('info');
  });

  it('forgets the logger once closed', () => {
    const first = makeLogger('svc-a');
    closeLogger('svc-a');
    expect(getLogFilePath('svc-a')).toBeNull();
    expect(makeLogger('svc-a')).not.toBe(first);
  });
});
