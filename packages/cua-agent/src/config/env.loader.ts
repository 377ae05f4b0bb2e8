import { Logger } from '@nestjs/common';
import { config as loadDotenv } from 'dotenv';
import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';

const logger = new Logger('EnvLoader');

/**
 * Loads `.env` from `startDir` and up to `maxParents` parent directories.
 * Nearer files win and variables already set in the environment are kept.
 * Returns the files that were loaded.
 */
export function loadEnvFiles(
  startDir: string = process.cwd(),
  maxParents = 3,
): string[] {
  const loaded: string[] = [];
  let dir = resolve(startDir);

  for (let level = 0; level <= maxParents; level++) {
    const file = join(dir, '.env');
    if (existsSync(file)) {
      const result = loadDotenv({ path: file, override: false });
      if (result.error) {
        logger.warn(`Could not read ${file}: ${result.error.message}`);
      } else {
        loaded.push(file);
      }
    }

    const parent = dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  return loaded;
}
