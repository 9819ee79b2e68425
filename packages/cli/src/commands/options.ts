/**
 * Option parsing shared by the commands.
 */

import {
  Client,
  EnvLoader,
  Logger,
  LogLevel,
  parseJsonValue,
  type JsonValue,
} from '@bedrock-adapter/core';

export interface CommonOptions {
  region?: string;
  envFile?: string;
  verbose?: boolean;
}

/**
 * Apply --env-file and --verbose before anything reads the environment.
 */
export function applyCommonOptions(options: CommonOptions): void {
  if (options.verbose) {
    Logger.setVerbosity(LogLevel.INFO);
  }
  if (options.envFile) {
    EnvLoader.load(options.envFile);
  }
}

/**
 * A client for --region, falling back to AWS_REGION and then the default region.
 */
export function buildClient(options: CommonOptions): Client {
  const builder = Client.builder();
  if (options.region) {
    builder.region(options.region);
  }
  return builder.build();
}

export function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`--${name} must be a number, got "${value}"`);
  }
  return parsed;
}

export function parseIntegerOption(name: string, value: string | undefined): number | undefined {
  const parsed = parseNumberOption(name, value);
  if (parsed !== undefined && (!Number.isInteger(parsed) || parsed <= 0)) {
    throw new Error(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseParams(value: string | undefined): JsonValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  try {
    return parseJsonValue(value);
  } catch (error) {
    throw new Error(
      `--params is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}
