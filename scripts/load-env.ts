/**
 * Load .env.local (and .env) before anything reads LLM settings from the environment.
 * Import this first in scripts: import './load-env.js'
 */
import { config } from 'dotenv';
import path from 'node:path';

config({ path: path.resolve(process.cwd(), '.env.local') });
config();
