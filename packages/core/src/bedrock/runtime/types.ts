/**
 * Transport seam between the adapters and Bedrock.
 *
 * The adapters only ever call these three methods, so tests can swap the
 * SDK client for an in-process runtime.
 */

import type {
  ConverseCommandInput,
  ConverseResponse,
  InvokeModelCommandInput,
} from '@aws-sdk/client-bedrock-runtime';

export interface InvokeModelResult {
  body: Uint8Array;
  contentType?: string;
}

export interface BedrockRuntime {
  converse(input: ConverseCommandInput): Promise<ConverseResponse>;

  invokeModel(input: InvokeModelCommandInput): Promise<InvokeModelResult>;

  /** Release sockets held by the underlying client */
  destroy(): void;
}

export interface RuntimeConfig {
  region: string;
  /** Request timeout in ms */
  timeout: number;
  connectionTimeout: number;
  /** Total attempts the SDK retry strategy may make, first one included */
  maxAttempts?: number;
}
