export interface ErrorContext {
  documentId?: string;
  chunkId?: string;
  operation?: string;
  [key: string]: string | number | undefined;
}

function describe(context: ErrorContext): string {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` [${parts.join(", ")}]` : "";
}

/**
 * Base class for every error the RAG core raises. The context is rendered
 * into the message so a log line alone is enough to reproduce the failure.
 */
export class RagError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message + describe(context), options);
    this.name = new.target.name;
    this.context = context;
  }
}

/** Nothing to chunk. Callers skip the document. */
export class EmptyDocumentError extends RagError {}

/** Messy tabular input arrived without the Analysis it requires. */
export class MissingAnalysisError extends RagError {}

/** The embedding model changed without a reindex. Fatal for the collection. */
export class DimensionMismatchError extends RagError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    context: ErrorContext = {},
  ) {
    super(`Vector dimension ${actual} does not match index dimension ${expected}`, context);
  }
}

/** Backing model service unreachable, timed out or overloaded. Retryable. */
export class GatewayUnavailableError extends RagError {}

/** The model service answered, but not with something usable. */
export class GatewayResponseError extends RagError {}

/** Document-scoped failure; nothing from the document was inserted. */
export class IngestionError extends RagError {}

/** Index and metadata disagree. Halts the collection until it is rebuilt. */
export class ConsistencyError extends RagError {}

export class DuplicateChunkError extends RagError {}

/** The collection is closed or halted; distinct from an empty result. */
export class CollectionUnavailableError extends RagError {}

export class UnsupportedFormatError extends RagError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
