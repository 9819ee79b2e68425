import * as fs from 'fs';
import * as path from 'path';
import { Logger } from './logger';

export class EnvLoader {
  /**
   * Load KEY=VALUE pairs from a dotenv file into `env`.
   * Variables that are already set win over the file.
   *
   * @returns the number of variables that were set
   */
  static load(envFile: string, env: NodeJS.ProcessEnv = process.env): number {
    const resolved = path.resolve(envFile);

    if (!fs.existsSync(resolved)) {
      Logger.warn(`[EnvLoader] Environment file not found: ${resolved}`);
      return 0;
    }

    Logger.debug(`[EnvLoader] Loading environment from: ${resolved}`);

    let loaded = 0;
    for (const line of fs.readFileSync(resolved, 'utf-8').split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) {
        continue;
      }

      const match = trimmed.match(/^(?:export\s+)?([^=\s]+)\s*=(.*)$/);
      if (!match) {
        continue;
      }

      const key = match[1];
      const value = unquote(match[2].trim());
      if (env[key] === undefined) {
        env[key] = value;
        loaded++;
      }
    }

    Logger.debug(`[EnvLoader] ✓ ${loaded} variables loaded`);
    return loaded;
  }
}

function unquote(value: string): string {
  const quoted = /^(['"])(.*)\1$/.exec(value);
  return quoted ? quoted[2] : value;
}
