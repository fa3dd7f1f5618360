/**
 * Error types raised by the header codec and the PNG bridge.
 *
 * Every failure aborts the whole header (or image) being processed; callers
 * never see a partially decoded value.
 */

export type HeaderErrorCode =
  /** FileHeader did not start with FILE_SIGNATURE: usually "not this format". */
  | 'FormatSignatureMismatch'
  /** The cursor ran out of bits mid-field. */
  | 'TruncatedStream'
  /** A decoded enum value is outside the declared set. */
  | 'InvalidEnumValue'
  /** Declared and consumed extension bits disagree. */
  | 'ExtensionLengthMismatch'
  /** No alternative of a field's distribution can hold its value. */
  | 'UnrepresentableFieldValue'
  /** An array length differs from the count its header implies. */
  | 'FieldCountMismatch'
  /** A pass size points before its own header end or past the container. */
  | 'InvalidPassSize';

export class HeaderError extends Error {
  readonly code: HeaderErrorCode;

  /** Name of the innermost header being visited, if known. */
  readonly header: string | undefined;

  constructor(code: HeaderErrorCode, message: string, header?: string) {
    super(header === undefined ? message : `${header}: ${message}`);
    this.name = 'HeaderError';
    this.code = code;
    this.header = header;
  }
}

export type PngErrorCode =
  | 'InvalidHeader'
  | 'UnsupportedColorType'
  | 'UnsupportedBitDepth'
  | 'ColorMismatch'
  | 'UnsupportedLayout'
  | 'InvalidImage';

export class PngError extends Error {
  readonly code: PngErrorCode;

  constructor(code: PngErrorCode, message: string) {
    super(message);
    this.name = 'PngError';
    this.code = code;
  }
}

/**
 * True for the one failure a caller may treat as "not my format".
 */
export function isFormatMismatch(error: unknown): boolean {
  return error instanceof HeaderError && error.code === 'FormatSignatureMismatch';
}
