export type PipelineErrorCode = 'EXTRACTION_EMPTY' | 'NO_RECORDS' | 'MALFORMED_TABLE';

export class PipelineError extends Error {
  constructor(
    public code: PipelineErrorCode,
    message: string,
    public warnings: string[] = []
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
