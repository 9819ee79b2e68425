import type { JsonValue } from './json';
import type { Message } from './message';
import type { ToolDefinition } from './tool';
import type {
  CompletionModel,
  CompletionRequest,
  CompletionResponse,
  ContextDocument,
} from './completion';

/**
 * Fluent builder for a single completion request.
 *
 * Usage:
 *   const response = await new CompletionRequestBuilder(model, 'Hello')
 *     .preamble('You are terse.')
 *     .temperature(0.2)
 *     .send();
 */
export class CompletionRequestBuilder<T> {
  private readonly request: CompletionRequest;

  constructor(
    private readonly model: CompletionModel<T>,
    prompt: string
  ) {
    this.request = { prompt, chatHistory: [], documents: [], tools: [] };
  }

  preamble(preamble: string): this {
    this.request.preamble = preamble;
    return this;
  }

  message(message: Message): this {
    this.request.chatHistory.push(message);
    return this;
  }

  messages(messages: Iterable<Message>): this {
    for (const message of messages) {
      this.message(message);
    }
    return this;
  }

  document(document: ContextDocument): this {
    this.request.documents.push(document);
    return this;
  }

  documents(documents: Iterable<ContextDocument>): this {
    for (const document of documents) {
      this.document(document);
    }
    return this;
  }

  tool(tool: ToolDefinition): this {
    this.request.tools.push(tool);
    return this;
  }

  tools(tools: Iterable<ToolDefinition>): this {
    for (const tool of tools) {
      this.tool(tool);
    }
    return this;
  }

  temperature(temperature: number | undefined): this {
    this.request.temperature = temperature;
    return this;
  }

  maxTokens(maxTokens: number | undefined): this {
    this.request.maxTokens = maxTokens;
    return this;
  }

  additionalParams(params: JsonValue | undefined): this {
    this.request.additionalParams = params;
    return this;
  }

  build(): CompletionRequest {
    return {
      ...this.request,
      chatHistory: [...this.request.chatHistory],
      documents: [...this.request.documents],
      tools: [...this.request.tools],
    };
  }

  send(): Promise<CompletionResponse<T>> {
    return this.model.completion(this.build());
  }
}
