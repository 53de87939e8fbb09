export type PipelineErrorCode =
  | 'UnsupportedFormat'
  | 'ExtractionFailed'
  | 'NoTextFound'
  | 'CredentialMissing'
  | 'CompletionFailed'
  | 'MalformedResponse'
  | 'PersistenceFailed'
  | 'DatasetUnavailable'
  | 'DatasetInvalid'
  | 'NotFound'
  | 'BadRequest';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(filename: string) {
    super('UnsupportedFormat', `'${filename}' is not a PDF file. Only PDF files are supported.`);
  }
}

export class ExtractionFailedError extends PipelineError {
  constructor(detail: string, cause?: unknown) {
    super('ExtractionFailed', `Error processing PDF: ${detail}`, { cause });
  }
}

export class NoTextFoundError extends PipelineError {
  constructor(filename: string) {
    super(
      'NoTextFound',
      `'${filename}' doesn't contain extractable text. It may be a scanned or image-based PDF (OCR needed).`,
    );
  }
}

export class CredentialMissingError extends PipelineError {
  constructor(variable: string) {
    super('CredentialMissing', `API key not found. Set the ${variable} environment variable.`);
  }
}

export class CompletionFailedError extends PipelineError {
  readonly status: number | undefined;

  constructor(detail: string, status?: number, cause?: unknown) {
    super('CompletionFailed', `Completion request failed: ${detail}`, { cause });
    this.status = status;
  }
}

export class PersistenceFailedError extends PipelineError {
  constructor(target: string, cause?: unknown) {
    super('PersistenceFailed', `Error saving file ${target}: ${describeError(cause)}`, { cause });
  }
}

export class DatasetUnavailableError extends PipelineError {
  constructor(datasetPath: string) {
    super('DatasetUnavailable', `Job dataset not found at ${datasetPath}. Run the preprocess script first.`);
  }
}

export class DatasetInvalidError extends PipelineError {
  constructor(detail: string) {
    super('DatasetInvalid', `Job dataset is invalid: ${detail}`);
  }
}

export class NotFoundError extends PipelineError {
  constructor(what: string) {
    super('NotFound', `${what} not found`);
  }
}

export class BadRequestError extends PipelineError {
  constructor(detail: string) {
    super('BadRequest', detail);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const HTTP_STATUS: Record<PipelineErrorCode, number> = {
  UnsupportedFormat: 415,
  ExtractionFailed: 422,
  NoTextFound: 422,
  CredentialMissing: 503,
  CompletionFailed: 502,
  MalformedResponse: 502,
  PersistenceFailed: 500,
  DatasetUnavailable: 500,
  DatasetInvalid: 500,
  NotFound: 404,
  BadRequest: 400,
};

export function httpStatusFor(err: unknown): number {
  return err instanceof PipelineError ? HTTP_STATUS[err.code] : 500;
}
