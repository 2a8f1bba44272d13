import { config } from 'dotenv';
import { resolve } from 'path';
import fs from 'fs';

const ENV_FILES = ['.env.local', '.env'];

/**
 * Loads .env.local, then .env. dotenv never overwrites a variable that is
 * already set, so the real environment wins over both files and
 * .env.local wins over .env.
 */
export const loadEnv = (cwd: string = process.cwd()): string[] => {
  const loaded: string[] = [];

  for (const file of ENV_FILES) {
    const path = resolve(cwd, file);
    if (!fs.existsSync(path)) continue;
    config({ path });
    loaded.push(file);
  }

  return loaded;
};
