/**
 * Completion contracts between the framework and a model provider.
 */

import type { JsonValue } from './json';
import type { Message } from './message';
import type { ToolDefinition } from './tool';

/**
 * Retrieved or static context attached to a prompt.
 */
export interface ContextDocument {
  id: string;
  text: string;
  additionalProps?: Record<string, string>;
}

export interface CompletionRequest {
  /** The new user turn */
  prompt: string;
  /** System instructions */
  preamble?: string;
  /** Prior turns, oldest first */
  chatHistory: Message[];
  documents: ContextDocument[];
  tools: ToolDefinition[];
  temperature?: number;
  maxTokens?: number;
  /** Provider-specific fields merged into the request as-is */
  additionalParams?: JsonValue;
}

export type ModelChoice =
  | { type: 'message'; text: string }
  | { type: 'toolCall'; name: string; id: string; arguments: JsonValue };

export interface CompletionResponse<T> {
  choice: ModelChoice;
  /** The provider's reply, kept for diagnostics */
  rawResponse: T;
}

export interface CompletionModel<T> {
  completion(request: CompletionRequest): Promise<CompletionResponse<T>>;
}

/**
 * Render a context document as an attachment block.
 * Metadata keys are sorted so the rendering is stable.
 */
export function renderContextDocument(document: ContextDocument): string {
  const props = Object.entries(document.additionalProps ?? {}).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0
  );

  const body =
    props.length === 0
      ? document.text
      : `<metadata ${props.map(([key, value]) => `${key}: ${JSON.stringify(value)}`).join(' ')} />\n${document.text}`;

  return `<file id: ${document.id}>\n${body}\n</file>\n`;
}

/**
 * The prompt text as sent to the model: attachments first, then the prompt.
 */
export function promptWithContext(request: Pick<CompletionRequest, 'prompt' | 'documents'>): string {
  if (request.documents.length === 0) {
    return request.prompt;
  }
  const attachments = request.documents.map(renderContextDocument).join('');
  return `<attachments>\n${attachments}</attachments>\n\n${request.prompt}`;
}
