import type { JsonValue } from './json';

/**
 * A function the model may call instead of answering with text.
 * `parameters` is a JSON Schema describing the arguments.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JsonValue;
}

export interface Tool {
  readonly name: string;
  definition(): ToolDefinition;
  call(args: JsonValue): Promise<string>;
}
