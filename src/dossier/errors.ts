/**
 * Dossier errors and warnings
 *
 * Errors are thrown and stop the build. Warnings are collected, logged by
 * the caller and never thrown.
 */

export type DossierErrorCode = 'INPUT' | 'EMPTY_RESULT' | 'OUTPUT';

/**
 * Base class for fatal dossier errors
 */
export class DossierError extends Error {
  constructor(
    message: string,
    public readonly code: DossierErrorCode
  ) {
    super(message);
    this.name = 'DossierError';
  }
}

/**
 * Bad or inconsistent input: unknown or duplicate ids, missing list files,
 * unreadable conversation records
 */
export class InputError extends DossierError {
  constructor(message: string) {
    super(message, 'INPUT');
    this.name = 'InputError';
  }
}

/**
 * Cleaning and filtering left nothing in the working body
 */
export class EmptyResultError extends DossierError {
  constructor(message = 'No included threads/segments: check filters, keywords and patterns') {
    super(message, 'EMPTY_RESULT');
    this.name = 'EmptyResultError';
  }
}

/**
 * No requested output format could be written
 */
export class OutputError extends DossierError {
  constructor(
    message: string,
    public readonly failures: FormatWriteWarning[] = []
  ) {
    super(message, 'OUTPUT');
    this.name = 'OutputError';
  }
}

/**
 * Appendix marker count differs from what the artifact list implies
 */
export class IntegrityWarning extends Error {
  constructor(
    public readonly marker: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`'${marker}' appears ${actual} times (expected ${expected})`);
    this.name = 'IntegrityWarning';
  }
}

/**
 * One output format failed to render or save
 */
export class FormatWriteWarning extends Error {
  constructor(
    public readonly format: string,
    public readonly reason: unknown
  ) {
    super(
      `${format.toUpperCase()} generation failed: ${reason instanceof Error ? reason.message : String(reason)}`
    );
    this.name = 'FormatWriteWarning';
  }
}

export type DossierWarning = IntegrityWarning | FormatWriteWarning;
