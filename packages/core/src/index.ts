/**
 * @bedrock-adapter/core
 *
 * Amazon Bedrock provider for the agent framework: completion over the
 * Converse API, Titan-style embeddings over InvokeModel, and the framework
 * contracts they implement.
 */

// ============================================================================
// Framework contracts
// ============================================================================
export * from './framework';

// ============================================================================
// Bedrock adapter
// ============================================================================
export * from './bedrock';

// ============================================================================
// Configuration
// ============================================================================
export * from './schemas';

// ============================================================================
// Utilities
// ============================================================================
export { Logger, LogLevel } from './utils/logger';
export { EnvLoader } from './utils/env-loader';
export { decodeBase64, encodeBase64 } from './utils/base64';
