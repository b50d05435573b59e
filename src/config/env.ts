import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load .env from the working directory or its parent so env vars are available
 * whether the CLI runs from the project root or from a subdirectory.
 */
export function loadEnv(): void {
  const cwd = process.cwd();
  const candidates = [
    path.join(cwd, '.env'),
    path.join(cwd, '..', '.env'),
  ];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error && process.env.NODE_ENV === 'development') {
        console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
      }
      return;
    }
  }
}

/** Read a string env var; unset or blank yields undefined. */
export function stringFromEnv(name: string): string | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw.trim();
}

/** Read a numeric env var; unset or blank yields undefined so schema defaults apply. */
export function numberFromEnv(name: string): number | undefined {
  const raw = stringFromEnv(name);
  return raw === undefined ? undefined : Number(raw);
}
