/**
 * Integration errors raised while mapping between framework values and
 * Bedrock wire values. None of them is retryable.
 */

export class IntegrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'IntegrationError';
  }
}

/** A content or role variant with no Bedrock counterpart. */
export class UnsupportedFeatureError extends IntegrationError {
  readonly feature: string;

  constructor(feature: string) {
    super(`Unsupported feature: ${feature}`);
    this.name = 'UnsupportedFeatureError';
    this.feature = feature;
  }
}

/** A known content kind in a sub-format Bedrock does not take, e.g. an SVG image. */
export class UnsupportedFormatError extends IntegrationError {
  readonly format: string;

  constructor(format: string) {
    super(`Unsupported format: ${format}`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

/** A mandatory wire field is missing or invalid. */
export class BuildError extends IntegrationError {
  constructor(detail: string) {
    super(`Failed to build: ${detail}`);
    this.name = 'BuildError';
  }
}

/** A payload could not be re-encoded, e.g. malformed base64. */
export class ConversionError extends IntegrationError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Failed to convert: ${detail}`, options);
    this.name = 'ConversionError';
  }
}

/** Bedrock sent a block that is missing something it always should carry. */
export class ModelError extends IntegrationError {
  constructor(detail: string) {
    super(`Model error: ${detail}`);
    this.name = 'ModelError';
  }
}
