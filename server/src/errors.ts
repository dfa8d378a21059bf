export type RecordErrorCode = 'NOT_FOUND' | 'CONFLICT' | 'INVALID';

// Raised by the data layer; routers translate the code into a status.
export class RecordError extends Error {
  constructor(message: string, public readonly code: RecordErrorCode) {
    super(message);
    this.name = 'RecordError';
  }
}

export class PoiProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string | null = null,
    public readonly statusCode: number | null = null
  ) {
    super(message);
    this.name = 'PoiProviderError';
  }
}

const STATUS_BY_CODE: Record<RecordErrorCode, number> = {
  NOT_FOUND: 404,
  CONFLICT: 409,
  INVALID: 400,
};

export const statusForError = (err: unknown): number =>
  err instanceof RecordError ? STATUS_BY_CODE[err.code] : 500;

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
