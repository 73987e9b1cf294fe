/**
 * Failure taxonomy of the question-answering pipeline.
 *
 * Only GenerationError aborts a query. The other two are recovered close to
 * where they are thrown and reach the model as tool-result text.
 */

/** The generation service was unreachable, rejected the request, or returned garbage. */
export class GenerationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'GenerationError';
  }
}

/** A query against the vector index failed. */
export class IndexQueryError extends Error {
  constructor(
    readonly collection: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'IndexQueryError';
  }
}

/** The model asked for a tool that was never registered. */
export class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Tool '${toolName}' not found`);
    this.name = 'UnknownToolError';
  }
}
