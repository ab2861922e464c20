import { readFileSync, existsSync } from 'fs';
import path from 'path';

const SECRETS_DIR = process.env.SECRETS_DIR || '/run/secrets';

/**
 * Read a secret from a mounted secrets directory, falling back to an
 * environment variable. Returns undefined when neither is present.
 */
export function getOptionalSecret(
  name: string,
  fallbackEnv?: string,
  secretsDir: string = SECRETS_DIR
): string | undefined {
  const secretPath = path.join(secretsDir, name);

  if (existsSync(secretPath)) {
    const value = readFileSync(secretPath, 'utf8').trim();
    if (value) {
      return value;
    }
  }

  const fromEnv = fallbackEnv ? process.env[fallbackEnv] : undefined;
  return fromEnv ? fromEnv.trim() : undefined;
}
