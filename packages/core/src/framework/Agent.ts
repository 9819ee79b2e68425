/**
 * Agent
 *
 * A completion model bundled with its preamble, static context, tools and
 * sampling settings. One prompt is one completion: a text reply is returned
 * as-is, a tool call is dispatched to the matching tool and the tool's
 * output is returned instead.
 */

import { Logger } from '../utils/logger';
import { CompletionRequestBuilder } from './CompletionRequestBuilder';
import { ToolCallError, ToolNotFoundError } from './errors';
import type { CompletionModel, ContextDocument } from './completion';
import type { JsonValue } from './json';
import type { Message } from './message';
import type { Tool } from './tool';

interface AgentConfig<T> {
  model: CompletionModel<T>;
  preamble?: string;
  context: ContextDocument[];
  tools: Map<string, Tool>;
  temperature?: number;
  maxTokens?: number;
  additionalParams?: JsonValue;
}

export class Agent<T> {
  constructor(private readonly config: AgentConfig<T>) {}

  /**
   * Start a completion request pre-filled with this agent's settings.
   */
  completionRequest(prompt: string, chatHistory: Message[] = []): CompletionRequestBuilder<T> {
    const builder = new CompletionRequestBuilder(this.config.model, prompt)
      .messages(chatHistory)
      .documents(this.config.context)
      .tools([...this.config.tools.values()].map(tool => tool.definition()))
      .temperature(this.config.temperature)
      .maxTokens(this.config.maxTokens)
      .additionalParams(this.config.additionalParams);

    return this.config.preamble !== undefined ? builder.preamble(this.config.preamble) : builder;
  }

  prompt(prompt: string): Promise<string> {
    return this.chat(prompt, []);
  }

  async chat(prompt: string, chatHistory: Message[]): Promise<string> {
    const { choice } = await this.completionRequest(prompt, chatHistory).send();

    switch (choice.type) {
      case 'message':
        return choice.text;
      case 'toolCall':
        return this.callTool(choice.name, choice.arguments);
    }
  }

  async callTool(name: string, args: JsonValue): Promise<string> {
    const tool = this.config.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }

    Logger.debug(`[Agent] Calling tool: ${name}`);
    try {
      return await tool.call(args);
    } catch (error) {
      throw new ToolCallError(name, { cause: error });
    }
  }
}

export class AgentBuilder<T> {
  private readonly config: AgentConfig<T>;

  constructor(model: CompletionModel<T>) {
    this.config = { model, context: [], tools: new Map() };
  }

  preamble(preamble: string): this {
    this.config.preamble = preamble;
    return this;
  }

  /** Append to the preamble, separated by a blank line. */
  appendPreamble(extra: string): this {
    this.config.preamble =
      this.config.preamble === undefined ? extra : `${this.config.preamble}\n\n${extra}`;
    return this;
  }

  context(text: string): this {
    this.config.context.push({ id: `static_doc_${this.config.context.length}`, text });
    return this;
  }

  tool(tool: Tool): this {
    this.config.tools.set(tool.name, tool);
    return this;
  }

  temperature(temperature: number): this {
    this.config.temperature = temperature;
    return this;
  }

  maxTokens(maxTokens: number): this {
    this.config.maxTokens = maxTokens;
    return this;
  }

  additionalParams(params: JsonValue): this {
    this.config.additionalParams = params;
    return this;
  }

  build(): Agent<T> {
    return new Agent({
      ...this.config,
      context: [...this.config.context],
      tools: new Map(this.config.tools),
    });
  }
}
