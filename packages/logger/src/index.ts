import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import pino, { multistream, type Level, type Logger as PinoLogger, type StreamEntry } from 'pino';

const packageDirectory = fileURLToPath(new URL('.', import.meta.url));
const repositoryRoot = path.resolve(packageDirectory, '..', '..', '..');

const managedLoggers = new Map<string, ManagedLogger>();

const LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

type FileDestination = ReturnType<typeof pino.destination>;

interface ManagedLogger {
  logger: Logger;
  fileStream: FileDestination | null;
  filePath: string | null;
}

export type Logger = PinoLogger;

function resolveLogRoot(): string {
  const configured = process.env.LOG_DIR?.trim();
  if (configured && configured.length > 0) {
    return path.resolve(configured);
  }
  return path.join(repositoryRoot, 'logs');
}

function isLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(): Level {
  const configured = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  return isLevel(configured) ? configured : 'info';
}

function shouldWriteLogFile(): boolean {
  return process.env.LOG_TO_FILE?.trim() !== '0';
}

function createRunFileName(): string {
  const iso = new Date().toISOString().replace(/[:.]/g, '-');
  return `run-${iso}-${process.pid}.log`;
}

function openServiceLogFile(serviceName: string): { filePath: string; stream: FileDestination } {
  const serviceDir = path.join(resolveLogRoot(), serviceName);
  fs.mkdirSync(serviceDir, { recursive: true });

  const filePath = path.join(serviceDir, createRunFileName());
  // Opened synchronously so the file exists once makeLogger returns.
  const stream = pino.destination({ dest: filePath, sync: true, append: true });
  return { filePath, stream };
}

export function makeLogger(serviceName: string): Logger {
  const existing = managedLoggers.get(serviceName);
  if (existing) {
    return existing.logger;
  }

  const level = resolveLevel();
  const streams: StreamEntry[] = [{ level, stream: process.stdout }];

  let file: { filePath: string; stream: FileDestination } | null = null;
  if (shouldWriteLogFile()) {
    file = openServiceLogFile(serviceName);
    streams.push({ level, stream: file.stream });
  }

  const logger = pino(
    {
      level,
      base: {
        service: serviceName,
        pid: process.pid,
        hostname: os.hostname(),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );

  managedLoggers.set(serviceName, {
    logger,
    fileStream: file?.stream ?? null,
    filePath: file?.filePath ?? null,
  });

  return logger;
}

export function getLogFilePath(serviceName: string): string | null {
  return managedLoggers.get(serviceName)?.filePath ?? null;
}

export function closeLogger(serviceName: string): void {
  const entry = managedLoggers.get(serviceName);
  if (!entry) {
    return;
  }

  managedLoggers.delete(serviceName);
  entry.logger.flush();
  entry.fileStream?.end();
}
