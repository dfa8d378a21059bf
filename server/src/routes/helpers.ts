import { Response } from 'express';
import { errorMessage, statusForError } from '../errors';
import { logError } from '../logger';

export const isInvalid = (value?: unknown, min = 1): boolean => {
  return typeof value !== 'string' || value.trim().length < min;
};

export const optionalString = (value: unknown): string | null | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') return null;
  return value.trim() || null;
};

export const optionalNumber = (value: unknown): number | null | undefined => {
  if (value === undefined) return undefined;
  if (value === null || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const isDateOrEmpty = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && ISO_DATE.test(value));

// Store errors carry their own status; anything else is logged and reported generically.
export const sendError = (res: Response, err: unknown, failure: string): void => {
  const status = statusForError(err);
  if (status === 500) {
    logError(failure, err);
    res.status(500).json({ error: failure });
    return;
  }
  res.status(status).json({ error: errorMessage(err) });
};
