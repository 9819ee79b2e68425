#!/usr/bin/env node

/**
 * Bedrock Adapter CLI
 *
 * Example program for the Bedrock adapter.
 *
 * Usage:
 *   bedrock-adapter complete <prompt>    Send one prompt and print the reply
 *   bedrock-adapter embed <texts...>     Embed texts and preview the vectors
 *   bedrock-adapter models               List the known model ids
 */

import { Command } from 'commander';
import { TITAN_TEXT_EMBEDDINGS_V2 } from '@bedrock-adapter/core';
import { completeCommand, DEFAULT_COMPLETION_MODEL } from '../commands/complete';
import { embedCommand } from '../commands/embed';
import { modelsCommand } from '../commands/models';

const program = new Command();

program.name('bedrock-adapter').description('Talk to Amazon Bedrock models').version('0.1.0');

// bedrock-adapter complete <prompt>
program
  .command('complete <prompt>')
  .description('Send a prompt to a completion model')
  .option('-m, --model <modelId>', 'Model ID', DEFAULT_COMPLETION_MODEL)
  .option('-r, --region <region>', 'AWS region (default: AWS_REGION or us-east-1)')
  .option('-p, --preamble <text>', 'System preamble')
  .option('-t, --temperature <number>', 'Sampling temperature')
  .option('--max-tokens <number>', 'Maximum output tokens')
  .option('--params <json>', 'Extra model request fields as JSON')
  .option('--env-file <file>', 'Load environment variables from a dotenv file')
  .option('-v, --verbose', 'Verbose output')
  .action(async (prompt: string, options) => {
    await completeCommand(prompt, options);
  });

// bedrock-adapter embed <texts...>
program
  .command('embed <texts...>')
  .description('Embed texts with a Titan-compatible embedding model')
  .option('-m, --model <modelId>', 'Embedding model ID', TITAN_TEXT_EMBEDDINGS_V2)
  .option('-d, --dimensions <number>', 'Embedding size (Titan V2: 256, 512 or 1024)')
  .option('-r, --region <region>', 'AWS region (default: AWS_REGION or us-east-1)')
  .option('--env-file <file>', 'Load environment variables from a dotenv file')
  .option('-v, --verbose', 'Verbose output')
  .action(async (texts: string[], options) => {
    await embedCommand(texts, options);
  });

// bedrock-adapter models
program
  .command('models')
  .description('List known model ids')
  .action(() => {
    modelsCommand();
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
