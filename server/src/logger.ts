import fs from 'fs';
import path from 'path';
import { getSettings } from './config';

type Level = 'error' | 'warn';

let stream: fs.WriteStream | null = null;

const getStream = (): fs.WriteStream => {
  if (!stream) {
    const logDir = getSettings().logDir;
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    stream = fs.createWriteStream(path.join(logDir, 'api-error.log'), { flags: 'a' });
  }
  return stream;
};

export const formatError = (err: unknown): string => {
  if (err instanceof Error) {
    const stack = err.stack ? `\n${err.stack}` : '';
    return `${err.message}${stack}`;
  }
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return 'Unknown error';
  }
};

export const formatLine = (level: Level, message: string, err?: unknown, timestamp = new Date()): string => {
  const suffix = err !== undefined ? ` ${formatError(err)}` : '';
  return `[${level}] ${timestamp.toISOString()} ${message}${suffix}\n`;
};

export const logError = (message: string, err?: unknown): void => {
  getStream().write(formatLine('error', message, err));
};

export const logWarn = (message: string, err?: unknown): void => {
  getStream().write(formatLine('warn', message, err));
};
