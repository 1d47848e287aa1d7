// ─── OAuth ───────────────────────────────────────────────────────────────────

export interface OAuthTokenResponse {
  access_token: string;
  instance_url: string;
  id: string;
  token_type: string;
  scope?: string;
  issued_at?: string;
}

export interface DataCloudTokenResponse {
  access_token: string;
  instance_url: string;
  token_type: string;
  issued_token_type?: string;
  expires_in?: number;
}

export interface CachedToken {
  accessToken: string;
  instanceUrl: string; // always https://<tenant host>
  expiresAt: number; // epoch ms
}

// ─── Bulk jobs ───────────────────────────────────────────────────────────────

export type JobState =
  | 'Open'
  | 'UploadComplete'
  | 'InProgress'
  | 'JobComplete'
  | 'Failed'
  | 'Aborted';

export type JobOperation = 'upsert' | 'delete';

export const TERMINAL_JOB_STATES: readonly JobState[] = ['JobComplete', 'Failed', 'Aborted'];
export const ACTIVE_JOB_STATES: readonly JobState[] = ['Open', 'UploadComplete', 'InProgress'];

export interface JobInfo {
  id: string;
  object: string;
  sourceName: string;
  operation: JobOperation;
  state: JobState;
  contentType?: string;
  apiVersion?: string;
  contentUrl?: string;
  createdById?: string;
  createdDate?: string;
  systemModstamp?: string;
  retries?: number;
  totalProcessingTime?: number;
  numberRecordsProcessed?: number;
  numberRecordsFailed?: number;
}

export interface JobList {
  data: JobInfo[];
  done: boolean;
  nextRecordsUrl?: string;
}

export interface ListJobsOptions {
  /** 1..100, default 50 */
  limit?: number;
  offset?: number;
  /** Field to order by; the API defaults to systemModstamp. */
  orderBy?: string;
  states?: JobState[];
}

export interface WaitForJobOptions {
  intervalMs?: number;
  timeoutMs?: number;
}

// ─── Streaming ingest ────────────────────────────────────────────────────────

export type IngestRow = Record<string, unknown>;

export interface StreamingIngestResponse {
  accepted: boolean;
}

export interface StreamingUpsertOptions {
  /** Validate the payload only; nothing is committed. */
  testMode?: boolean;
}

// ─── Query ───────────────────────────────────────────────────────────────────

export interface QueryColumnMetadata {
  type: string;
  placeInOrder: number;
  typeCode: number;
}

export interface QueryResponse {
  data: unknown[][];
  startTime?: string;
  endTime?: string;
  rowCount: number;
  queryId: string;
  nextBatchId?: string;
  done: boolean;
  metadata: Record<string, QueryColumnMetadata>;
}

export interface QueryResult {
  queryId: string;
  columns: string[];
  metadata: Record<string, QueryColumnMetadata>;
  rows: unknown[][];
  rowCount: number;
}

// ─── Client Config ──────────────────────────────────────────────────────────

export interface DataCloudClientConfig {
  loginUrl: string;
  clientId: string;
  userName: string;
  /** PEM-encoded RSA private key of the connected app certificate */
  privateKey: string;
  /** Token TTL in ms (default: 115 min, below the 2 h Data Cloud expiry) */
  tokenTtlMs?: number;
  /** Per-request timeout in ms (default: 120 000) */
  requestTimeoutMs?: number;
  /** Where split bulk files are written (default: OS temp dir) */
  tempDir?: string;
  /** Encoding of bulk input files (default: utf-8) */
  inputFileEncoding?: string;
}
