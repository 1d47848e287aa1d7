#!/usr/bin/env node
import 'dotenv/config';

import { logger } from '../shared/logger.js';
import { validateEnv } from '../config/env-validator.js';
import { getConfig } from '../config/config-manager.js';
import { DataCloudClient } from '../datacloud/client/index.js';
import { createProgram } from './program.js';

const program = createProgram({
  createClient: async () => {
    validateEnv();
    return DataCloudClient.fromConfig(getConfig());
  },
  write: (text) => process.stdout.write(text),
});

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ err }, err instanceof Error ? err.message : 'Command failed');
  process.exitCode = 1;
});
