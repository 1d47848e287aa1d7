import { logger } from '../shared/logger.js';
import { ValidationError } from '../shared/errors.js';

/** Env vars needed to authenticate against Data Cloud. */
const REQUIRED_VARS = [
  'DATACLOUD_CLIENT_ID',
  'DATACLOUD_PRIVATE_KEY_FILE',
  'DATACLOUD_USERNAME',
];

/** Optional env vars that must hold a positive whole number when set. */
const POSITIVE_INT_VARS = ['DATACLOUD_TOKEN_TTL_MINUTES', 'DATACLOUD_REQUEST_TIMEOUT_MS'];

/**
 * Validate environment variables.
 *
 * Throws a ValidationError naming every missing variable, so callers can
 * report all of them at once instead of failing on the first API call.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): void {
  const missing: string[] = [];
  for (const varName of REQUIRED_VARS) {
    if (!env[varName]) {
      missing.push(varName);
    }
  }

  if (missing.length > 0) {
    throw new ValidationError(
      `Missing required environment variables: ${missing.join(', ')}`,
    );
  }

  const encoding = env.DATACLOUD_INPUT_FILE_ENCODING;
  if (encoding && !isSupportedEncoding(encoding)) {
    throw new ValidationError(`Unsupported DATACLOUD_INPUT_FILE_ENCODING: ${encoding}`);
  }

  for (const varName of POSITIVE_INT_VARS) {
    const value = env[varName]?.trim();
    if (value && !(/^\d+$/.test(value) && parseInt(value, 10) > 0)) {
      throw new ValidationError(`${varName} must be a positive integer, got "${value}"`);
    }
  }

  logger.debug('Environment validation passed');
}

export function isSupportedEncoding(encoding: string): boolean {
  try {
    new TextDecoder(encoding);
    return true;
  } catch {
    return false;
  }
}
