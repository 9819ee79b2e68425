/**
 * Models Command
 *
 * Lists the model ids the adapter knows by name. Any other Bedrock model id
 * can still be passed to --model.
 */

import chalk from 'chalk';
import { listModels, type CatalogueEntry } from '@bedrock-adapter/core';

export function formatModels(entries: CatalogueEntry[]): string[] {
  const width = Math.max(...entries.map(entry => entry.name.length));
  return entries.map(entry => `${entry.name.padEnd(width)}  ${entry.modelId}`);
}

export function modelsCommand(): void {
  const entries = listModels();

  console.log(chalk.bold('\nCompletion models\n'));
  formatModels(entries.filter(entry => entry.kind === 'completion')).forEach(line =>
    console.log(`  ${line}`)
  );

  console.log(chalk.bold('\nEmbedding models\n'));
  formatModels(entries.filter(entry => entry.kind === 'embedding')).forEach(line =>
    console.log(`  ${line}`)
  );
  console.log('');
}
