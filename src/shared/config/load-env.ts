import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

const ENV_FILES: Record<string, string> = {
  production: '.env.prod',
  development: '.env.local',
};

/**
 * Loads the dotenv file for the current NODE_ENV into process.env.
 * ENV_FILE wins when set; `.env` is the fallback for every environment.
 * Variables already present in the environment are never overwritten.
 */
export function loadEnv(cwd: string = process.cwd()): string | null {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const candidates = [
    process.env.ENV_FILE ?? ENV_FILES[nodeEnv] ?? '.env',
    '.env',
  ];

  for (const candidate of candidates) {
    const envPath = path.resolve(cwd, candidate);
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      return candidate;
    }
  }

  // Containers get their configuration from the real environment.
  if (nodeEnv !== 'test') {
    console.warn(
      `No environment file found (tried ${candidates.join(', ')}), using process environment only`,
    );
  }
  return null;
}
