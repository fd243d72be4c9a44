export type PipelineStage = 'extract' | 'validate';

export type PipelineErrorCode = 'missing_column' | 'truncated_source' | 'output_missing';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly stage: PipelineStage;
  readonly details?: unknown;

  constructor(code: PipelineErrorCode, stage: PipelineStage, message: string, details?: unknown) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.stage = stage;
    this.details = details;
  }
}

export function missingColumn(source: string, column: string, details?: unknown): PipelineError {
  return new PipelineError('missing_column', 'extract', `${source} is missing column ${column}`, details);
}

export function truncatedSource(source: string, expected: number, actual: number): PipelineError {
  return new PipelineError(
    'truncated_source',
    'extract',
    `${source} declares ${expected} records but only ${actual} could be read`,
    { expected, actual }
  );
}

export function outputMissing(filePath: string): PipelineError {
  return new PipelineError('output_missing', 'validate', `expected output file ${filePath} was not written`, {
    filePath,
  });
}
