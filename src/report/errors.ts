/**
 * Formatting failures
 */

export type FormatStage =
  | 'input'
  | 'pricing'
  | 'competitors'
  | 'market'
  | 'risks'
  | 'recommendations'
  | 'summary';

/**
 * An unexpected shape or value while assembling the report document.
 */
export class FormattingError extends Error {
  readonly stage: FormatStage;

  constructor(stage: FormatStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FormattingError';
    this.stage = stage;
  }
}

export type FormatOutcome<T> = { ok: true; value: T } | { ok: false; error: FormattingError };

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
