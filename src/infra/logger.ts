/**
 * Append-only NDJSON event log.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuid } from 'uuid';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  id: string;
  ts: string;
  level: LogLevel;
  event: string;
  data: Record<string, unknown>;
}

export class EventLogger {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<void> {
    const entry: LogEntry = {
      id: uuid(),
      ts: isoNow(),
      level,
      event,
      data,
    };

    const line = `${JSON.stringify(entry)}\n`;
    const write = this.queue.then(() => fs.appendFile(this.logFilePath, line, 'utf-8'));
    // Later writes still run if this one fails; the caller sees the failure.
    this.queue = write.catch(() => undefined);
    await write;
  }

  async readAll(): Promise<LogEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.logFilePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    return raw
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => JSON.parse(line) as LogEntry);
  }
}

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);
