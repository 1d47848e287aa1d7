/**
 * Push two rows through the streaming Ingest API.
 *
 * Requires a `.env` file with real Data Cloud credentials:
 *   DATACLOUD_CLIENT_ID, DATACLOUD_PRIVATE_KEY_FILE, DATACLOUD_USERNAME
 *
 * Run:  npm run sample:streaming -- [--test]
 */

import 'dotenv/config';

import { getConfig } from '../src/config/config-manager.js';
import { validateEnv } from '../src/config/env-validator.js';
import { DataCloudClient } from '../src/datacloud/client/index.js';

const SOURCE_API_NAME = process.env.SAMPLE_SOURCE_API_NAME ?? 'Event_API';
const OBJECT_NAME = process.env.SAMPLE_OBJECT_NAME ?? 'runner_profiles';

const rows = [
  {
    maid: 123,
    first_name: 'Test',
    last_name: 'Runner',
    email: 'runner1@example.com',
    city: 'Wilton',
    state: 'CT',
    created: '2021-10-22T09:11:11.816319Z',
  },
  {
    maid: 124,
    first_name: 'Sample',
    last_name: 'Runner',
    email: 'runner2@example.com',
    city: 'San Francisco',
    state: 'CA',
    created: '2021-10-22T09:11:11.816319Z',
  },
];

async function main() {
  validateEnv();
  const client = await DataCloudClient.fromConfig(getConfig());
  const testMode = process.argv.includes('--test');

  console.log(`--- Streaming upsert to ${SOURCE_API_NAME}/${OBJECT_NAME}${testMode ? ' (test mode)' : ''} ---`);
  const result = await client.streamingUpsert(SOURCE_API_NAME, OBJECT_NAME, rows, { testMode });
  console.log(`  accepted: ${result.accepted}`);
}

main().catch((err) => {
  console.error('Sample failed:', err);
  process.exit(1);
});
