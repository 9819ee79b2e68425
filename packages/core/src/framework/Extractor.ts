/**
 * Extractor
 *
 * Pulls structured data out of free text. The model is handed a single
 * `submit` tool whose parameters are the target JSON Schema; the arguments
 * of that call are validated with the matching zod schema.
 */

import type { z } from 'zod';
import { Logger } from '../utils/logger';
import { Agent, AgentBuilder } from './Agent';
import { ExtractionError } from './errors';
import type { CompletionModel } from './completion';
import type { JsonObject, JsonValue } from './json';
import type { Tool, ToolDefinition } from './tool';

export const SUBMIT_TOOL_NAME = 'submit';

const EXTRACTOR_PREAMBLE =
  'You are an AI assistant whose purpose is to extract structured data from the provided text.\n' +
  `You will have access to a \`${SUBMIT_TOOL_NAME}\` function that defines the structure of the data to extract from the provided text.\n` +
  `Use the \`${SUBMIT_TOOL_NAME}\` function to submit the structured data.\n` +
  `Be sure to fill out every field and ALWAYS CALL THE \`${SUBMIT_TOOL_NAME}\` function, even with default values!`;

class SubmitTool implements Tool {
  readonly name = SUBMIT_TOOL_NAME;

  constructor(private readonly parameters: JsonObject) {}

  definition(): ToolDefinition {
    return {
      name: SUBMIT_TOOL_NAME,
      description: 'Submit the structured data you extracted from the provided text.',
      parameters: this.parameters,
    };
  }

  async call(args: JsonValue): Promise<string> {
    return JSON.stringify(args);
  }
}

export class Extractor<T, R> {
  constructor(
    private readonly agent: Agent<R>,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  async extract(text: string): Promise<T> {
    const { choice } = await this.agent.completionRequest(text).send();

    if (choice.type !== 'toolCall' || choice.name !== SUBMIT_TOOL_NAME) {
      throw new ExtractionError('No data extracted');
    }

    const parsed = this.schema.safeParse(choice.arguments);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `[${issue.path.join('.') || 'root'}]: ${issue.message}`)
        .join(', ');
      Logger.warn(`[Extractor] ✗ Submitted data failed validation: ${issues}`);
      throw new ExtractionError(`Invalid data: ${issues}`, { cause: parsed.error });
    }

    return parsed.data;
  }
}

export class ExtractorBuilder<T, R> {
  private readonly agentBuilder: AgentBuilder<R>;

  /**
   * @param schema - validates the submitted arguments
   * @param parameters - JSON Schema for the same shape, shown to the model
   */
  constructor(
    model: CompletionModel<R>,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    parameters: JsonObject
  ) {
    this.agentBuilder = new AgentBuilder(model)
      .preamble(EXTRACTOR_PREAMBLE)
      .tool(new SubmitTool(parameters));
  }

  /** Extra instructions, appended to the built-in preamble. */
  preamble(preamble: string): this {
    this.agentBuilder.appendPreamble(preamble);
    return this;
  }

  context(text: string): this {
    this.agentBuilder.context(text);
    return this;
  }

  build(): Extractor<T, R> {
    return new Extractor(this.agentBuilder.build(), this.schema);
  }
}
