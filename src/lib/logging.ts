import { promises as fs } from 'fs';
import path from 'path';
import { mkdirp, rollByDate } from './fsutil';

export type LogEvent = {
  type: string;
  level?: 'info' | 'warn' | 'error';
  payload?: Record<string, unknown>;
};

type LoggingOptions = {
  dir: string;
  echo: boolean;
};

const options: LoggingOptions = { dir: 'logs', echo: false };

export function configureLogging(next: Partial<LoggingOptions>): void {
  if (next.dir !== undefined) options.dir = next.dir;
  if (next.echo !== undefined) options.echo = next.echo;
}

export function currentLogFile(): string {
  return path.join(options.dir, rollByDate('run', 'ndjson'));
}

export async function logEvent(event: LogEvent): Promise<void> {
  const entry = { t: new Date().toISOString(), level: event.level ?? 'info', ...event };
  const line = JSON.stringify(entry) + '\n';
  if (options.echo) {
    const print = entry.level === 'error' ? console.error : entry.level === 'warn' ? console.warn : console.log;
    print(line.trimEnd());
  }
  await mkdirp(options.dir);
  await fs.appendFile(currentLogFile(), line, 'utf8');
}

export function errorPayload(err: unknown): Record<string, unknown> {
  if (err instanceof Error) return { msg: err.message, name: err.name };
  return { msg: String(err) };
}

/** Fire-and-forget variant for call sites that must not wait on or fail with the log write. */
export function emit(event: LogEvent): void {
  logEvent(event).catch((err: unknown) => {
    console.error('log write failed', err);
  });
}
