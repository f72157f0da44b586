export type TableErrorCode =
  | 'MALFORMED_ADDRESS'
  | 'UNRESOLVABLE_BOUNDARY'
  | 'SHAPE_MISMATCH'
  | 'INVALID_SCAN_CONFIG'
  | 'WORKBOOK_ERROR';

export abstract class TableError extends Error {
  abstract readonly code: TableErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An address or boundary string matches no recognized notation. */
export class MalformedAddressError extends TableError {
  readonly code = 'MALFORMED_ADDRESS';

  constructor(readonly address: string, detail?: string) {
    super(detail ? `illegal cell address '${address}': ${detail}` : `illegal cell address '${address}'`);
  }
}

export class UnresolvableBoundaryError extends TableError {
  readonly code = 'UNRESOLVABLE_BOUNDARY';

  constructor(readonly axis: 'row' | 'column', readonly index: number, cause: unknown) {
    super(
      `stop condition for ${axis} ${index} could not be evaluated: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class ShapeMismatchError extends TableError {
  readonly code = 'SHAPE_MISMATCH';

  constructor(readonly fieldName: string, message: string) {
    super(message);
  }
}

export class InvalidScanConfigError extends TableError {
  readonly code = 'INVALID_SCAN_CONFIG';

  constructor(readonly issues: string[]) {
    super(`Invalid scan configuration: ${issues.join('; ')}`);
  }
}

export class WorkbookError extends TableError {
  readonly code = 'WORKBOOK_ERROR';
}

export function isUsageError(error: unknown): boolean {
  return error instanceof MalformedAddressError || error instanceof InvalidScanConfigError;
}
