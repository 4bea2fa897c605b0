export type ErrorEnvelope = {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
};

const STATUS_CODE_MAP: Record<number, string> = {
  400: 'ERR_BAD_REQUEST',
  404: 'ERR_NOT_FOUND',
  409: 'ERR_CONFLICT',
  422: 'ERR_UNPROCESSABLE',
  500: 'ERR_INTERNAL',
  503: 'ERR_UNAVAILABLE',
};

export function errorResponse(
  message: string,
  code = 'ERR_REQUEST',
  details?: unknown
): ErrorEnvelope {
  return { error: { code, message, ...(details === undefined ? {} : { details }) } };
}

export function errorResponseForStatus(
  status: number,
  message: string,
  details?: unknown
): ErrorEnvelope {
  const code = STATUS_CODE_MAP[status] ?? 'ERR_REQUEST';
  return errorResponse(message, code, details);
}

// ---- Ingest failure taxonomy ------------------------------------------------

export const IngestErrorCode = {
  FILE_NOT_FOUND: 'E1001',
  FILE_EXTENSION: 'E1002',
  FILE_READ: 'E1003',
  HEADER_NOT_FOUND: 'E1004',
  DATA_PROCESSING: 'E2001',
  DATA_VALIDATION: 'E2002',
  SINK: 'E3001',
  RUN_LOCKED: 'E4003',
  RUN_NOT_FOUND: 'E5001',
  SYSTEM: 'E9001',
} as const;
export type IngestErrorCode = (typeof IngestErrorCode)[keyof typeof IngestErrorCode];

export type IngestErrorKind =
  | 'FileNotReadable'
  | 'HeaderNotFound'
  | 'DataValidationFailed'
  | 'DataProcessingFailed'
  | 'SinkFailed'
  | 'RunNotFound'
  | 'RunLocked'
  | 'SystemFailed';

export class IngestError extends Error {
  constructor(
    readonly kind: IngestErrorKind,
    readonly code: IngestErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toEnvelope(): ErrorEnvelope {
    return errorResponse(this.message, this.code, this.details);
  }
}

export class FileNotReadableError extends IngestError {
  constructor(
    code: 'E1001' | 'E1002' | 'E1003',
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super('FileNotReadable', code, message, code === 'E1001' ? 404 : 422, details, options);
  }
}

export class HeaderNotFoundError extends IngestError {
  constructor(sheet: string, header: readonly string[]) {
    super(
      'HeaderNotFound',
      IngestErrorCode.HEADER_NOT_FOUND,
      `Header row [${header.join(', ')}] not found in sheet "${sheet}".`,
      422,
      { sheet, header: [...header] }
    );
  }
}

export class DataValidationError extends IngestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DataValidationFailed', IngestErrorCode.DATA_VALIDATION, message, 422, details);
  }
}

export class DataProcessingError extends IngestError {
  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(
      'DataProcessingFailed',
      IngestErrorCode.DATA_PROCESSING,
      message,
      422,
      options?.details,
      options
    );
  }
}

export class SinkError extends IngestError {
  constructor(table: string, options?: { cause?: unknown }) {
    super(
      'SinkFailed',
      IngestErrorCode.SINK,
      `Failed to write records to ${table}.`,
      500,
      { table },
      options
    );
  }
}

export class RunNotFoundError extends IngestError {
  constructor(fileSeq: number) {
    super('RunNotFound', IngestErrorCode.RUN_NOT_FOUND, `Ingest run ${fileSeq} not found.`, 404, {
      fileSeq,
    });
  }
}

export class RunLockedError extends IngestError {
  constructor(fileSeq: number) {
    super(
      'RunLocked',
      IngestErrorCode.RUN_LOCKED,
      `Ingest run ${fileSeq} is already being processed.`,
      409,
      { fileSeq }
    );
  }
}

export class SystemError extends IngestError {
  constructor(options?: { cause?: unknown }) {
    super('SystemFailed', IngestErrorCode.SYSTEM, 'A system error occurred.', 500, undefined, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
