import { logger } from '../utils/logger';

/** Identity and timestamps shared by every record the scanner produces. */
export interface RecordIdentity {
  id: number;
  createdAt: number;
  updatedAt: number;
}

export function createIdentity(now: number = Date.now()): RecordIdentity {
  return {
    id: now,
    createdAt: now,
    updatedAt: now,
  };
}

export type RecordEncoder = (record: RecordIdentity) => string | undefined;

export interface ErrorReporter {
  logError(error: unknown): void;
}

export interface SerializeOptions {
  encode?: RecordEncoder;
  reporter?: ErrorReporter;
}

export const EMPTY_RECORD_TEXT = '{}';

const defaultEncoder: RecordEncoder = (record) => JSON.stringify(record);

const loggingReporter: ErrorReporter = {
  logError(error: unknown): void {
    logger.error({ error }, 'Failed to serialize media record');
  },
};

export class RecordEncodingError extends Error {
  constructor(public readonly recordId: number) {
    super(`Encoder produced no text for record ${recordId}`);
    this.name = 'RecordEncodingError';
  }
}

/**
 * Renders the full record (nested values included) as JSON text.
 * Never throws: an encoder failure is reported once and `{}` is returned instead.
 */
export function serializeRecord(record: RecordIdentity, options: SerializeOptions = {}): string {
  const encode = options.encode ?? defaultEncoder;
  const reporter = options.reporter ?? loggingReporter;
  try {
    const text = encode(record);
    if (text === undefined) {
      throw new RecordEncodingError(record.id);
    }
    return text;
  } catch (error) {
    reporter.logError(error);
    return EMPTY_RECORD_TEXT;
  }
}
