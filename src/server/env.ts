/**
 * .env loading shared by the MCP server and the batch CLI
 *
 * @module server/env
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/**
 * Candidate .env files, first found wins:
 * 1. DUPLEX_SEQUENCER_ENV_FILE (explicit override)
 * 2. CWD/.env
 * 3. Package root/.env
 */
export function envCandidates(env: Record<string, string | undefined> = process.env): string[] {
  return [
    env.DUPLEX_SEQUENCER_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(moduleDir, '..', '..', '.env'),
    path.resolve(moduleDir, '..', '..', '..', '.env'),
  ].filter((p): p is string => typeof p === 'string');
}

/**
 * @returns the file that was loaded, or null when none exists
 */
export function loadEnvironment(): string | null {
  for (const envPath of envCandidates()) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}
