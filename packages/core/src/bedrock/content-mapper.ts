/**
 * Content Mapper
 *
 * Maps framework message content to Bedrock content blocks ("from*") and
 * Bedrock content blocks back to framework content ("into*").
 *
 * Supported pairs:
 * - Text        <-> text block
 * - Image       <-> image block     (gif, jpeg, png, webp)
 * - Document    <-> document block  (csv, html, md, pdf, txt)
 * - ToolCall    <-> toolUse block   (arguments through the document codec)
 * - ToolResult  <-> toolResult block (text and image results; json results
 *                                     come back as their JSON text)
 *
 * Framework attachments carry base64 text, Bedrock carries raw bytes.
 *
 * Converting a whole message is lenient: content items that fail to map are
 * logged and dropped, so replaying history never fails on one bad item.
 * Converting a single item is strict and throws an IntegrationError.
 */

import {
  ConversationRole,
  DocumentFormat,
  ImageFormat,
  type ContentBlock,
  type DocumentBlock,
  type ImageBlock,
  type Message as BedrockMessage,
  type ToolResultContentBlock,
} from '@aws-sdk/client-bedrock-runtime';
import {
  DocumentMediaType,
  ImageMediaType,
  type AssistantContent,
  type DocumentContent,
  type ImageContent,
  type Message,
  type MessageContent,
  type ToolCall,
  type ToolResult,
  type ToolResultContent,
  type UserContent,
} from '../framework';
import { decodeBase64, encodeBase64 } from '../utils/base64';
import { Logger } from '../utils/logger';
import { fromWireDocument, toWireDocument } from './document-codec';
import {
  BuildError,
  ConversionError,
  IntegrationError,
  ModelError,
  UnsupportedFeatureError,
  UnsupportedFormatError,
} from './errors';

/** Bedrock requires a name on every document block. */
export const DEFAULT_DOCUMENT_NAME = 'document';

// ============================================================================
// Roles and messages
// ============================================================================

/**
 * Map a framework role name onto a Bedrock conversation role.
 * Unrecognized roles fall back to user.
 */
export function resolveConversationRole(role: string): ConversationRole {
  switch (role) {
    case 'user':
      return ConversationRole.USER;
    case 'assistant':
      return ConversationRole.ASSISTANT;
    default:
      Logger.warn(`[ContentMapper] Unrecognized role "${role}", sending it as user`);
      return ConversationRole.USER;
  }
}

export function fromMessage(message: Message): BedrockMessage {
  const role = resolveConversationRole(message.role);
  const toBlock = role === ConversationRole.ASSISTANT ? fromAssistantContent : fromUserContent;

  const items = nameDocuments(message.content);
  const content = mapLeniently(
    items,
    toBlock,
    item => item.type,
    `${role} message`
  );
  if (content.length === 0) {
    throw new BuildError(`${role} message has no content Bedrock supports`);
  }

  return { role, content };
}

/**
 * Give unnamed documents distinct names (document-1, document-2, ...) when a
 * turn carries more than one of them. A lone unnamed document keeps the
 * default name.
 */
export function nameDocuments(items: readonly MessageContent[]): MessageContent[] {
  const unnamed = items.filter(item => item.type === 'document' && item.name === undefined);
  if (unnamed.length < 2) {
    return [...items];
  }

  let index = 0;
  return items.map(item => {
    if (item.type !== 'document' || item.name !== undefined) {
      return item;
    }
    index += 1;
    return { ...item, name: `${DEFAULT_DOCUMENT_NAME}-${index}` };
  });
}

export function intoMessage(message: BedrockMessage): Message {
  switch (message.role) {
    case ConversationRole.ASSISTANT: {
      const content = mapLeniently(
        message.content ?? [],
        intoAssistantContent,
        describeVariant,
        'assistant reply',
        'debug'
      );
      if (content.length === 0) {
        throw new UnsupportedFeatureError('Message returned invalid response');
      }
      return { role: 'assistant', content };
    }
    case ConversationRole.USER: {
      const content = mapLeniently(
        message.content ?? [],
        intoUserContent,
        describeVariant,
        'user turn',
        'debug'
      );
      if (content.length === 0) {
        throw new UnsupportedFeatureError('Message returned invalid response');
      }
      return { role: 'user', content };
    }
    default:
      throw new UnsupportedFeatureError(
        `AWS Bedrock returned unsupported ConversationRole: ${String(message.role)}`
      );
  }
}

// ============================================================================
// Framework -> Bedrock
// ============================================================================

export function fromUserContent(content: MessageContent): ContentBlock {
  switch (content.type) {
    case 'text':
      return { text: content.text };
    case 'image':
      return { image: fromImage(content) };
    case 'document':
      return { document: fromDocument(content) };
    case 'toolResult':
      return { toolResult: fromToolResult(content) };
    case 'audio':
      throw new UnsupportedFeatureError('Audio');
    case 'toolCall':
      throw new UnsupportedFeatureError('ToolCall in a user message');
  }
}

export function fromAssistantContent(content: MessageContent): ContentBlock {
  switch (content.type) {
    case 'text':
      return { text: content.text };
    case 'toolCall':
      return { toolUse: fromToolCall(content) };
    case 'image':
      throw new UnsupportedFeatureError('Image in an assistant message');
    case 'document':
      throw new UnsupportedFeatureError('Document in an assistant message');
    case 'audio':
      throw new UnsupportedFeatureError('Audio');
    case 'toolResult':
      throw new UnsupportedFeatureError('ToolResult in an assistant message');
  }
}

export function fromToolCall(call: ToolCall): NonNullable<ContentBlock['toolUse']> {
  if (!call.id) {
    throw new BuildError('tool use id is missing');
  }
  if (!call.function.name) {
    throw new BuildError('tool use name is missing');
  }
  return {
    toolUseId: call.id,
    name: call.function.name,
    input: toWireDocument(call.function.arguments),
  };
}

export function fromToolResult(result: ToolResult): NonNullable<ContentBlock['toolResult']> {
  if (!result.id) {
    throw new BuildError('tool result id is missing');
  }

  const content = mapLeniently(
    result.content,
    fromToolResultContent,
    item => item.type,
    `tool result ${result.id}`
  );
  if (content.length === 0) {
    throw new BuildError(`tool result ${result.id} has no content Bedrock supports`);
  }

  return { toolUseId: result.id, content };
}

export function fromToolResultContent(content: ToolResultContent): ToolResultContentBlock {
  switch (content.type) {
    case 'text':
      return { text: content.text };
    case 'image':
      return { image: fromImage(content) };
  }
}

export function fromImage(image: ImageContent): ImageBlock {
  if (image.format === 'string') {
    throw new UnsupportedFormatError('string-encoded image');
  }
  if (image.mediaType === undefined) {
    throw new BuildError('image media type is missing');
  }

  return {
    format: toImageFormat(image.mediaType),
    source: { bytes: decodeAttachment(image.data) },
  };
}

export function fromDocument(document: DocumentContent): DocumentBlock {
  if (document.format === 'string') {
    throw new UnsupportedFormatError('string-encoded document');
  }
  if (document.mediaType === undefined) {
    throw new BuildError('document media type is missing');
  }
  const name = document.name ?? DEFAULT_DOCUMENT_NAME;
  if (name.trim() === '') {
    throw new BuildError('document name is empty');
  }

  return {
    format: toDocumentFormat(document.mediaType),
    name,
    source: { bytes: decodeAttachment(document.data) },
  };
}

function toImageFormat(mediaType: ImageMediaType): ImageFormat {
  switch (mediaType) {
    case ImageMediaType.GIF:
      return ImageFormat.GIF;
    case ImageMediaType.JPEG:
      return ImageFormat.JPEG;
    case ImageMediaType.PNG:
      return ImageFormat.PNG;
    case ImageMediaType.WEBP:
      return ImageFormat.WEBP;
    case ImageMediaType.HEIC:
    case ImageMediaType.HEIF:
    case ImageMediaType.SVG:
      throw new UnsupportedFormatError(mediaType);
  }
}

function toDocumentFormat(mediaType: DocumentMediaType): DocumentFormat {
  switch (mediaType) {
    case DocumentMediaType.CSV:
      return DocumentFormat.CSV;
    case DocumentMediaType.HTML:
      return DocumentFormat.HTML;
    case DocumentMediaType.MARKDOWN:
      return DocumentFormat.MD;
    case DocumentMediaType.PDF:
      return DocumentFormat.PDF;
    case DocumentMediaType.TXT:
      return DocumentFormat.TXT;
    case DocumentMediaType.RTF:
    case DocumentMediaType.CSS:
    case DocumentMediaType.XML:
    case DocumentMediaType.JAVASCRIPT:
    case DocumentMediaType.PYTHON:
      throw new UnsupportedFormatError(mediaType);
  }
}

function decodeAttachment(data: string): Uint8Array {
  try {
    return decodeBase64(data);
  } catch (error) {
    throw new ConversionError(error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}

// ============================================================================
// Bedrock -> Framework
// ============================================================================

export function intoUserContent(block: ContentBlock): UserContent {
  if (block.text !== undefined) {
    return { type: 'text', text: block.text };
  }
  if (block.toolResult !== undefined) {
    return intoToolResult(block.toolResult);
  }
  if (block.document !== undefined) {
    return intoDocument(block.document);
  }
  if (block.image !== undefined) {
    return intoImage(block.image);
  }
  throw new UnsupportedFeatureError(`ContentBlock variant ${describeVariant(block)} in a user turn`);
}

export function intoAssistantContent(block: ContentBlock): AssistantContent {
  if (block.text !== undefined) {
    return { type: 'text', text: block.text };
  }
  if (block.toolUse !== undefined) {
    return intoToolCall(block.toolUse);
  }
  throw new UnsupportedFeatureError(
    `ContentBlock variant ${describeVariant(block)} in an assistant turn`
  );
}

export function intoToolCall(block: NonNullable<ContentBlock['toolUse']>): ToolCall {
  if (block.toolUseId === undefined) {
    throw new ModelError('Tool use id is missing');
  }
  if (block.name === undefined) {
    throw new ModelError('Tool use name is missing');
  }
  return {
    type: 'toolCall',
    id: block.toolUseId,
    function: { name: block.name, arguments: fromWireDocument(block.input) },
  };
}

export function intoToolResult(block: NonNullable<ContentBlock['toolResult']>): ToolResult {
  if (block.toolUseId === undefined) {
    throw new ModelError('Tool result id is missing');
  }

  const content = mapLeniently(
    block.content ?? [],
    intoToolResultContent,
    describeVariant,
    `tool result ${block.toolUseId}`,
    'debug'
  );
  if (content.length === 0) {
    throw new UnsupportedFeatureError('ToolResult returned invalid response');
  }

  return { type: 'toolResult', id: block.toolUseId, content };
}

export function intoToolResultContent(block: ToolResultContentBlock): ToolResultContent {
  if (block.text !== undefined) {
    return { type: 'text', text: block.text };
  }
  if (block.image !== undefined) {
    return intoImage(block.image);
  }
  if (block.json !== undefined) {
    return { type: 'text', text: JSON.stringify(fromWireDocument(block.json)) };
  }
  throw new UnsupportedFeatureError(
    `ToolResultContentBlock variant ${describeVariant(block)}`
  );
}

export function intoImage(block: ImageBlock): ImageContent {
  const bytes = block.source?.bytes;
  if (bytes === undefined) {
    throw new ModelError('Image source is missing');
  }

  return {
    type: 'image',
    data: encodeBase64(bytes),
    format: 'base64',
    mediaType: intoImageMediaType(block.format),
  };
}

export function intoDocument(block: DocumentBlock): DocumentContent {
  const bytes = block.source?.bytes;
  if (bytes === undefined) {
    throw new ModelError('Document source is missing');
  }

  const document: DocumentContent = {
    type: 'document',
    data: encodeBase64(bytes),
    format: 'base64',
    mediaType: intoDocumentMediaType(block.format),
  };
  if (block.name !== undefined) {
    document.name = block.name;
  }
  return document;
}

function intoImageMediaType(format: ImageFormat | undefined): ImageMediaType {
  switch (format) {
    case ImageFormat.GIF:
      return ImageMediaType.GIF;
    case ImageFormat.JPEG:
      return ImageMediaType.JPEG;
    case ImageFormat.PNG:
      return ImageMediaType.PNG;
    case ImageFormat.WEBP:
      return ImageMediaType.WEBP;
    default:
      throw new UnsupportedFormatError(String(format ?? 'unknown image format'));
  }
}

function intoDocumentMediaType(format: DocumentFormat | undefined): DocumentMediaType {
  switch (format) {
    case DocumentFormat.CSV:
      return DocumentMediaType.CSV;
    case DocumentFormat.HTML:
      return DocumentMediaType.HTML;
    case DocumentFormat.MD:
      return DocumentMediaType.MARKDOWN;
    case DocumentFormat.PDF:
      return DocumentMediaType.PDF;
    case DocumentFormat.TXT:
      return DocumentMediaType.TXT;
    default:
      throw new UnsupportedFormatError(String(format ?? 'unknown document format'));
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Outbound history drops are warnings; blocks skipped in a reply are debug noise. */
type DropLogLevel = 'warn' | 'debug';

/**
 * Map every item, dropping (and logging) the ones that raise an
 * IntegrationError. Any other error propagates.
 */
function mapLeniently<I, O>(
  items: readonly I[],
  map: (item: I) => O,
  describe: (item: I) => string,
  context: string,
  level: DropLogLevel = 'warn'
): O[] {
  const mapped: O[] = [];
  for (const item of items) {
    try {
      mapped.push(map(item));
    } catch (error) {
      if (!(error instanceof IntegrationError)) {
        throw error;
      }
      const line = `[ContentMapper] Dropping ${describe(item)} from ${context}: ${error.message}`;
      if (level === 'warn') {
        Logger.warn(line);
      } else {
        Logger.debug(line);
      }
    }
  }
  return mapped;
}

/** Name of the union member a wire block carries, e.g. "text" or "toolUse". */
function describeVariant(block: object): string {
  const entry = Object.entries(block).find(([, value]) => value !== undefined);
  return entry ? entry[0] : 'unknown';
}
