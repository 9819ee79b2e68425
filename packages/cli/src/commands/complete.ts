/**
 * Complete Command
 *
 * Sends one prompt to a Bedrock model and prints the reply, or the tool call
 * the model asked for.
 *
 * Usage:
 *   bedrock-adapter complete "Summarize this repo"
 *   bedrock-adapter complete "Hi" --model amazon.nova-pro-v1:0 --temperature 0.2
 *   bedrock-adapter complete "Hi" --params '{"top_k": 40}'
 */

import chalk from 'chalk';
import ora from 'ora';
import { BedrockModel, Client, type ModelChoice } from '@bedrock-adapter/core';
import {
  applyCommonOptions,
  buildClient,
  parseIntegerOption,
  parseNumberOption,
  parseParams,
  type CommonOptions,
} from './options';

export interface CompleteCommandOptions extends CommonOptions {
  model: string;
  preamble?: string;
  temperature?: string;
  maxTokens?: string;
  params?: string;
}

export const DEFAULT_COMPLETION_MODEL = BedrockModel.NOVA_LITE;

/**
 * Run one completion with the given client.
 */
export async function runCompletion(
  client: Client,
  prompt: string,
  options: CompleteCommandOptions
): Promise<ModelChoice> {
  const builder = client
    .completionModel(options.model)
    .completionRequest(prompt)
    .temperature(parseNumberOption('temperature', options.temperature))
    .maxTokens(parseIntegerOption('max-tokens', options.maxTokens))
    .additionalParams(parseParams(options.params));

  if (options.preamble !== undefined) {
    builder.preamble(options.preamble);
  }

  const { choice } = await builder.send();
  return choice;
}

export function formatChoice(choice: ModelChoice): string {
  switch (choice.type) {
    case 'message':
      return choice.text;
    case 'toolCall':
      return `Tool call: ${choice.name} (${choice.id})\n${JSON.stringify(choice.arguments, null, 2)}`;
  }
}

export async function completeCommand(
  prompt: string,
  options: CompleteCommandOptions
): Promise<void> {
  applyCommonOptions(options);

  const spinner = ora(`Asking ${options.model}...`).start();
  let client: Client | undefined;

  try {
    client = buildClient(options);
    const choice = await runCompletion(client, prompt, options);
    spinner.succeed(`Reply from ${options.model}`);

    const output = formatChoice(choice);
    console.log(choice.type === 'toolCall' ? chalk.cyan(output) : output);
  } catch (error) {
    spinner.fail('Completion failed');
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  } finally {
    client?.destroy();
  }
}
