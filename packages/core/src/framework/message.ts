/**
 * Framework message model.
 *
 * A message is a conversation turn tagged by role. The role decides which
 * content variants it may hold: user turns carry text, images, documents,
 * audio and tool results; assistant turns carry text and tool calls.
 */

import type { JsonValue } from './json';

// ============================================================================
// Media types
// ============================================================================

export const ImageMediaType = {
  JPEG: 'image/jpeg',
  PNG: 'image/png',
  GIF: 'image/gif',
  WEBP: 'image/webp',
  HEIC: 'image/heic',
  HEIF: 'image/heif',
  SVG: 'image/svg+xml',
} as const;
export type ImageMediaType = (typeof ImageMediaType)[keyof typeof ImageMediaType];

export const DocumentMediaType = {
  PDF: 'application/pdf',
  TXT: 'text/plain',
  RTF: 'text/rtf',
  HTML: 'text/html',
  CSS: 'text/css',
  MARKDOWN: 'text/markdown',
  CSV: 'text/csv',
  XML: 'text/xml',
  JAVASCRIPT: 'application/x-javascript',
  PYTHON: 'application/x-python',
} as const;
export type DocumentMediaType = (typeof DocumentMediaType)[keyof typeof DocumentMediaType];

export const AudioMediaType = {
  WAV: 'audio/wav',
  MP3: 'audio/mp3',
  AIFF: 'audio/aiff',
  AAC: 'audio/aac',
  OGG: 'audio/ogg',
  FLAC: 'audio/flac',
} as const;
export type AudioMediaType = (typeof AudioMediaType)[keyof typeof AudioMediaType];

/** How an attachment's `data` is encoded. */
export type ContentFormat = 'base64' | 'string';

export type ImageDetail = 'low' | 'high' | 'auto';

// ============================================================================
// Content variants
// ============================================================================

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ImageContent {
  type: 'image';
  /** Base64-encoded image bytes */
  data: string;
  format?: ContentFormat;
  mediaType?: ImageMediaType;
  detail?: ImageDetail;
}

export interface DocumentContent {
  type: 'document';
  /** Base64-encoded document bytes */
  data: string;
  format?: ContentFormat;
  mediaType?: DocumentMediaType;
  /** Display name; some providers require one */
  name?: string;
}

export interface AudioContent {
  type: 'audio';
  data: string;
  format?: ContentFormat;
  mediaType?: AudioMediaType;
}

export interface ToolFunction {
  name: string;
  arguments: JsonValue;
}

export interface ToolCall {
  type: 'toolCall';
  id: string;
  function: ToolFunction;
}

export type ToolResultContent = TextContent | ImageContent;

export interface ToolResult {
  type: 'toolResult';
  /** Id of the tool call this result answers */
  id: string;
  content: ToolResultContent[];
}

export type UserContent = TextContent | ImageContent | DocumentContent | AudioContent | ToolResult;

export type AssistantContent = TextContent | ToolCall;

export type MessageContent = UserContent | AssistantContent;

// ============================================================================
// Messages
// ============================================================================

export interface UserMessage {
  role: 'user';
  content: UserContent[];
}

export interface AssistantMessage {
  role: 'assistant';
  content: AssistantContent[];
}

export type Message = UserMessage | AssistantMessage;

export type Role = Message['role'];

export function text(value: string): TextContent {
  return { type: 'text', text: value };
}

export function userMessage(value: string): UserMessage {
  return { role: 'user', content: [text(value)] };
}

export function assistantMessage(value: string): AssistantMessage {
  return { role: 'assistant', content: [text(value)] };
}

export function toolResultMessage(id: string, output: string): UserMessage {
  return { role: 'user', content: [{ type: 'toolResult', id, content: [text(output)] }] };
}
