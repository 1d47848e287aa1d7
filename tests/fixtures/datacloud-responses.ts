import type {
  CachedToken,
  JobInfo,
  JobList,
  OAuthTokenResponse,
  DataCloudTokenResponse,
  QueryResponse,
} from '../../src/datacloud/types.js';

export const TEST_TOKEN: CachedToken = {
  accessToken: 'dc-token',
  instanceUrl: 'https://tenant.c360a.salesforce.com',
  expiresAt: Number.MAX_SAFE_INTEGER,
};

export const coreTokenResponse: OAuthTokenResponse = {
  access_token: 'core-token',
  instance_url: 'https://example.my.salesforce.com',
  id: 'https://login.salesforce.com/id/00D/005',
  token_type: 'Bearer',
};

export const dataCloudTokenResponse: DataCloudTokenResponse = {
  access_token: 'dc-token',
  instance_url: 'tenant.c360a.salesforce.com',
  token_type: 'Bearer',
  expires_in: 7200,
};

export function jobInfo(overrides?: Partial<JobInfo>): JobInfo {
  return {
    id: 'job-1',
    object: 'runner_profiles',
    sourceName: 'Event_API',
    operation: 'upsert',
    state: 'Open',
    contentType: 'CSV',
    apiVersion: 'v1',
    ...overrides,
  };
}

export const activeJobs: JobList = {
  data: [jobInfo({ id: 'job-1', state: 'Open' }), jobInfo({ id: 'job-2', state: 'UploadComplete' })],
  done: true,
};

export const queryFirstPage: QueryResponse = {
  data: [
    [101.5, 'cust-1'],
    [52, 'cust-2'],
  ],
  rowCount: 2,
  queryId: 'q-1',
  nextBatchId: 'batch-2',
  done: false,
  metadata: {
    CustomerId: { type: 'VARCHAR', placeInOrder: 1, typeCode: 12 },
    TotalSpend: { type: 'DECIMAL', placeInOrder: 0, typeCode: 3 },
  },
};

export const querySecondPage: QueryResponse = {
  data: [[7, 'cust-3']],
  rowCount: 1,
  queryId: 'q-1',
  done: true,
  metadata: queryFirstPage.metadata,
};

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}
