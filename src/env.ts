/**
 * Environment variable loader
 *
 * This file MUST be imported before any other module that reads environment
 * variables (the logger reads LOG_LEVEL and NODE_ENV when it is created).
 * Variables come from, in order of precedence:
 *   1. Process environment (already set variables are never overridden)
 *   2. .env in the working directory
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { existsSync } from 'fs';

const envPath = resolve(process.cwd(), '.env');

let loadedFrom: string | null = null;

if (existsSync(envPath)) {
  const result = config({ path: envPath, override: false });
  if (result.parsed) {
    loadedFrom = envPath;
  }
}

export { loadedFrom };
