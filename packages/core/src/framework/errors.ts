/**
 * Error hierarchy for the framework contracts.
 *
 * Completion and embedding failures are split by where they happened:
 * building the request, the provider call, or interpreting the reply.
 */

interface ErrorCauseOptions {
  cause?: unknown;
}

interface ProviderErrorOptions extends ErrorCauseOptions {
  /** Provider-specific error code, e.g. the service exception name */
  errorCode?: string;
}

// ============================================================================
// Completion
// ============================================================================

export class CompletionError extends Error {
  constructor(message: string, options?: ErrorCauseOptions) {
    super(message, { cause: options?.cause });
    this.name = 'CompletionError';
  }
}

/** The outbound request could not be assembled. */
export class CompletionRequestError extends CompletionError {
  constructor(message: string, options?: ErrorCauseOptions) {
    super(message, options);
    this.name = 'CompletionRequestError';
  }
}

/** The provider call failed or returned nothing usable at the transport level. */
export class CompletionProviderError extends CompletionError {
  readonly errorCode?: string;

  constructor(message: string, options?: ProviderErrorOptions) {
    super(message, options);
    this.name = 'CompletionProviderError';
    this.errorCode = options?.errorCode;
  }
}

/** The reply arrived but held no message or tool call. */
export class CompletionResponseError extends CompletionError {
  constructor(message: string, options?: ErrorCauseOptions) {
    super(message, options);
    this.name = 'CompletionResponseError';
  }
}

// ============================================================================
// Embeddings
// ============================================================================

export class EmbeddingError extends Error {
  constructor(message: string, options?: ErrorCauseOptions) {
    super(message, { cause: options?.cause });
    this.name = 'EmbeddingError';
  }
}

export class EmbeddingProviderError extends EmbeddingError {
  readonly errorCode?: string;

  constructor(message: string, options?: ProviderErrorOptions) {
    super(message, options);
    this.name = 'EmbeddingProviderError';
    this.errorCode = options?.errorCode;
  }
}

export class EmbeddingResponseError extends EmbeddingError {
  constructor(message: string, options?: ErrorCauseOptions) {
    super(message, options);
    this.name = 'EmbeddingResponseError';
  }
}

/** The reply body was not the JSON envelope the model promises. */
export class EmbeddingJsonError extends EmbeddingError {
  constructor(message: string, options?: ErrorCauseOptions) {
    super(message, options);
    this.name = 'EmbeddingJsonError';
  }
}

// ============================================================================
// Agents and extractors
// ============================================================================

export class PromptError extends Error {
  constructor(message: string, options?: ErrorCauseOptions) {
    super(message, { cause: options?.cause });
    this.name = 'PromptError';
  }
}

export class ToolNotFoundError extends PromptError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
    this.toolName = toolName;
  }
}

export class ToolCallError extends PromptError {
  readonly toolName: string;

  constructor(toolName: string, options?: ErrorCauseOptions) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Tool ${toolName} failed: ${reason}`, options);
    this.name = 'ToolCallError';
    this.toolName = toolName;
  }
}

export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorCauseOptions) {
    super(message, { cause: options?.cause });
    this.name = 'ExtractionError';
  }
}
