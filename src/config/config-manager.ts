import { tmpdir } from 'node:os';

export interface AppConfig {
  // Salesforce / Data Cloud
  salesforce: {
    loginUrl: string;
    clientId: string;
    privateKeyFile: string;
    userName: string;
  };

  // Bulk uploads
  tempDir: string;
  inputFileEncoding: string;

  // Behavior
  tokenTtlMs: number;
  requestTimeoutMs: number;
}

let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (config) return config;

  config = {
    salesforce: {
      loginUrl: process.env.DATACLOUD_LOGIN_URL || 'login.salesforce.com',
      clientId: process.env.DATACLOUD_CLIENT_ID ?? '',
      privateKeyFile: process.env.DATACLOUD_PRIVATE_KEY_FILE ?? '',
      userName: process.env.DATACLOUD_USERNAME ?? '',
    },
    tempDir: process.env.DATACLOUD_TEMP_DIR || tmpdir(),
    inputFileEncoding: process.env.DATACLOUD_INPUT_FILE_ENCODING || 'utf-8',
    tokenTtlMs: parseInt(process.env.DATACLOUD_TOKEN_TTL_MINUTES || '115', 10) * 60_000,
    requestTimeoutMs: parseInt(process.env.DATACLOUD_REQUEST_TIMEOUT_MS || '120000', 10),
  };

  return config;
}

/** Reset config (for testing) */
export function resetConfig(): void {
  config = null;
}
