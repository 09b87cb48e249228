/**
 * Raised when no date can be recovered from a listing's date text.
 *
 * Scoped to a single record: ingestion skips the record and keeps going.
 */
export class DateParseError extends Error {
  readonly text: string;

  constructor(text: string, reason: string) {
    super(`Cannot parse date "${text}": ${reason}`);
    this.name = 'DateParseError';
    this.text = text;
  }
}
