/**
 * Upsert (or delete) the rows of one or more CSV files through a bulk job and
 * wait for Data Cloud to process it.
 *
 * Requires a `.env` file with real Data Cloud credentials:
 *   DATACLOUD_CLIENT_ID, DATACLOUD_PRIVATE_KEY_FILE, DATACLOUD_USERNAME
 *
 * Run:  npm run sample:bulk -- upsert profiles.csv [more.csv ...]
 *       npm run sample:bulk -- delete profile_ids.csv
 */

import 'dotenv/config';

import { getConfig } from '../src/config/config-manager.js';
import { validateEnv } from '../src/config/env-validator.js';
import { DataCloudClient } from '../src/datacloud/client/index.js';

const SOURCE_API_NAME = process.env.SAMPLE_SOURCE_API_NAME ?? 'Event_API';
const OBJECT_NAME = process.env.SAMPLE_OBJECT_NAME ?? 'runner_profiles';

async function main() {
  const [operation, ...files] = process.argv.slice(2);
  if ((operation !== 'upsert' && operation !== 'delete') || files.length === 0) {
    console.error('Usage: sample-bulk.ts <upsert|delete> <file.csv> [...]');
    process.exit(1);
  }

  validateEnv();
  const client = await DataCloudClient.fromConfig(getConfig());

  console.log(`--- 1. Bulk ${operation} of ${files.length} file(s) ---`);
  const job =
    operation === 'upsert'
      ? await client.bulkUpsert(SOURCE_API_NAME, OBJECT_NAME, files)
      : await client.bulkDelete(SOURCE_API_NAME, OBJECT_NAME, files);
  console.log(`  Job ${job.id} is ${job.state}`);

  console.log('--- 2. Wait for processing ---');
  const done = await client.waitForJob(job.id, { intervalMs: 10_000 });
  console.log(`  Job ${done.id} finished as ${done.state}`);
  console.log(`  processed: ${done.numberRecordsProcessed ?? 'n/a'}, failed: ${done.numberRecordsFailed ?? 'n/a'}`);
}

main().catch((err) => {
  console.error('Sample failed:', err);
  process.exit(1);
});
