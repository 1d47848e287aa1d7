/**
 * Run a SQL query against Data Cloud and print the rows.
 *
 * Requires a `.env` file with real Data Cloud credentials:
 *   DATACLOUD_CLIENT_ID, DATACLOUD_PRIVATE_KEY_FILE, DATACLOUD_USERNAME
 *
 * Run:  npm run sample:query -- ["SELECT ..."]
 */

import 'dotenv/config';

import { getConfig } from '../src/config/config-manager.js';
import { validateEnv } from '../src/config/env-validator.js';
import { DataCloudClient, toRecords } from '../src/datacloud/client/index.js';

const DEFAULT_SQL = `
  SELECT    SUM(ssot__SalesOrder__dlm.ssot__TotalAmount__c) AS TotalSpend,
            ssot__Individual__dlm.ssot__Id__c AS CustomerId
  FROM      ssot__SalesOrder__dlm
  JOIN      ssot__Individual__dlm
    ON      ssot__SalesOrder__dlm.ssot__SoldToCustomerId__c = ssot__Individual__dlm.ssot__Id__c
  GROUP BY  ssot__Individual__dlm.ssot__Id__c
  ORDER BY  1
`;

async function main() {
  validateEnv();
  const client = await DataCloudClient.fromConfig(getConfig());

  const result = await client.query(process.argv[2] ?? DEFAULT_SQL);
  console.log(`Query ${result.queryId} returned ${result.rowCount} rows`);
  console.table(toRecords(result));
}

main().catch((err) => {
  console.error('Sample failed:', err);
  process.exit(1);
});
