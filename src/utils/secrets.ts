import { readFileSync, existsSync } from 'fs';

const SECRETS_DIR = '/run/secrets';

/**
 * Read a secret from Docker secrets or fall back to an environment variable.
 * Docker secrets are mounted at /run/secrets/<name> in containers.
 */
export function getSecret(
  name: string,
  fallbackEnv?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const secretPath = `${SECRETS_DIR}/${name}`;
  const fromEnv = fallbackEnv ? env[fallbackEnv] : undefined;

  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf8').trim();
    } catch {
      // Mounted but unreadable: the env value still wins if present
      if (fromEnv) {
        return fromEnv;
      }
      throw new Error(`Secret "${name}" exists but could not be read at ${secretPath}`);
    }
  }

  if (fromEnv) {
    return fromEnv;
  }

  throw new Error(`Secret "${name}" not found at ${secretPath} and no fallback provided`);
}

/**
 * Read an optional secret - returns undefined if not found.
 */
export function getOptionalSecret(
  name: string,
  fallbackEnv?: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  try {
    return getSecret(name, fallbackEnv, env);
  } catch {
    return undefined;
  }
}
