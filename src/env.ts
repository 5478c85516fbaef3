/**
 * Environment variable loader
 *
 * Imported by the config service before anything reads process.env.
 * Loads variables from `.env` in the current working directory.
 * Variables already set in the process environment take precedence.
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { existsSync } from 'fs';

const envPath = resolve(process.cwd(), '.env');

if (existsSync(envPath)) {
  // Don't override existing env vars
  config({ path: envPath, override: false });
}
