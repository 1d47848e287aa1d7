import { readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { logger } from '../../shared/logger.js';
import { ValidationError } from '../../shared/errors.js';
import type { AppConfig } from '../../config/config-manager.js';
import { ACTIVE_JOB_STATES } from '../types.js';
import type {
  CachedToken,
  DataCloudClientConfig,
  IngestRow,
  JobInfo,
  JobList,
  JobOperation,
  ListJobsOptions,
  QueryResult,
  StreamingIngestResponse,
  StreamingUpsertOptions,
  WaitForJobOptions,
} from '../types.js';
import { DataCloudAuth } from './auth.js';
import { BulkIngest } from './bulk.js';
import type { BulkJobApi, FilePaths } from './bulk.js';
import { IngestJobs } from './jobs.js';
import { QueryRunner } from './query.js';
import { withToken } from './request.js';
import { StreamingIngest } from './streaming.js';

export { DataCloudAuth } from './auth.js';
export { BulkIngest, BULK_API_MAX_PAYLOAD_SIZE, type BulkJobApi, type FilePaths } from './bulk.js';
export { IngestJobs } from './jobs.js';
export { QueryRunner, toRecords, orderedColumns } from './query.js';
export { StreamingIngest, STREAMING_API_MAX_PAYLOAD_SIZE } from './streaming.js';

export class DataCloudClient implements BulkJobApi {
  private readonly auth: DataCloudAuth;
  private readonly streaming: StreamingIngest;
  private readonly jobs: IngestJobs;
  private readonly queries: QueryRunner;
  private readonly bulk: BulkIngest;

  constructor(config: DataCloudClientConfig) {
    this.auth = new DataCloudAuth({
      loginUrl: config.loginUrl,
      clientId: config.clientId,
      userName: config.userName,
      privateKey: config.privateKey,
      tokenTtlMs: config.tokenTtlMs,
      timeoutMs: config.requestTimeoutMs,
    });
    const requestOpts = { timeoutMs: config.requestTimeoutMs };
    this.streaming = new StreamingIngest(this.auth, requestOpts);
    this.jobs = new IngestJobs(requestOpts);
    this.queries = new QueryRunner(requestOpts);
    this.bulk = new BulkIngest(this, {
      tempDir: config.tempDir ?? tmpdir(),
      inputFileEncoding: config.inputFileEncoding,
    });
  }

  /** Build a client from environment config, reading the private key file. */
  static async fromConfig(config: AppConfig): Promise<DataCloudClient> {
    const { salesforce } = config;
    let privateKey: string;
    try {
      privateKey = await readFile(salesforce.privateKeyFile, 'utf8');
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(`Cannot read private key file ${salesforce.privateKeyFile}: ${reason}`);
    }

    return new DataCloudClient({
      loginUrl: salesforce.loginUrl,
      clientId: salesforce.clientId,
      userName: salesforce.userName,
      privateKey,
      tokenTtlMs: config.tokenTtlMs,
      requestTimeoutMs: config.requestTimeoutMs,
      tempDir: config.tempDir,
      inputFileEncoding: config.inputFileEncoding,
    });
  }

  /** Authenticate (or return cached token). */
  async authenticate(): Promise<CachedToken> {
    return this.auth.getToken();
  }

  // ── Streaming ingest ─────────────────────────────────────────────────────

  async streamingUpsert(
    sourceApiName: string,
    objectName: string,
    rows: readonly IngestRow[],
    opts?: StreamingUpsertOptions,
  ): Promise<StreamingIngestResponse> {
    return this.streaming.upsert(sourceApiName, objectName, rows, opts);
  }

  async streamingDelete(
    sourceApiName: string,
    objectName: string,
    ids: readonly string[],
  ): Promise<StreamingIngestResponse> {
    return this.streaming.delete(sourceApiName, objectName, ids);
  }

  // ── Bulk ingest ──────────────────────────────────────────────────────────

  /** Upsert the rows of one or more CSV files through a single bulk job. */
  async bulkUpsert(sourceApiName: string, objectName: string, filePaths: FilePaths): Promise<JobInfo> {
    return this.bulk.run(sourceApiName, objectName, filePaths, 'upsert');
  }

  /** Delete the rows whose primary keys are listed in one or more CSV files. */
  async bulkDelete(sourceApiName: string, objectName: string, filePaths: FilePaths): Promise<JobInfo> {
    return this.bulk.run(sourceApiName, objectName, filePaths, 'delete');
  }

  async waitForJob(jobId: string, opts?: WaitForJobOptions): Promise<JobInfo> {
    return this.bulk.waitForJob(jobId, opts);
  }

  // ── Job management ───────────────────────────────────────────────────────

  async createJob(
    sourceApiName: string,
    objectName: string,
    operation: JobOperation = 'upsert',
  ): Promise<JobInfo> {
    return this.withToken((token) => this.jobs.create(token, sourceApiName, objectName, operation));
  }

  async uploadJobData(jobId: string, csv: string | Uint8Array): Promise<void> {
    return this.withToken((token) => this.jobs.uploadBatch(token, jobId, csv));
  }

  async closeJob(jobId: string): Promise<JobInfo> {
    return this.withToken((token) => this.jobs.close(token, jobId, 'UploadComplete'));
  }

  async abortJob(jobId: string): Promise<JobInfo> {
    return this.withToken((token) => this.jobs.close(token, jobId, 'Aborted'));
  }

  async deleteJob(jobId: string): Promise<void> {
    return this.withToken((token) => this.jobs.delete(token, jobId));
  }

  async listJobs(opts?: ListJobsOptions): Promise<JobList> {
    return this.withToken((token) => this.jobs.list(token, opts));
  }

  /** Jobs that are Open, UploadComplete or InProgress. */
  async listActiveJobs(): Promise<JobList> {
    return this.listJobs({ states: [...ACTIVE_JOB_STATES] });
  }

  async getJobInfo(jobId: string): Promise<JobInfo> {
    return this.withToken((token) => this.jobs.info(token, jobId));
  }

  /** Abort every Open or UploadComplete job. Returns the ids it aborted. */
  async abortAllJobs(): Promise<string[]> {
    // Collect every page first: aborting shifts the offsets of a state-filtered list.
    const jobs: JobInfo[] = [];
    for (let offset = 0; ; ) {
      const page = await this.listJobs({ states: ['Open', 'UploadComplete'], offset });
      jobs.push(...page.data);
      if (page.done || page.data.length === 0) break;
      offset += page.data.length;
    }

    const aborted: string[] = [];
    for (const job of jobs) {
      logger.info({ jobId: job.id }, 'Abort job');
      await this.abortJob(job.id);
      aborted.push(job.id);
    }
    return aborted;
  }

  // ── Query ────────────────────────────────────────────────────────────────

  async query(sql: string): Promise<QueryResult> {
    return this.withToken((token) => this.queries.run(token, sql));
  }

  // ── private ───────────────────────────────────────────────────────────────

  /** Run a call with the current token, retrying once on 401 with a fresh one. */
  private async withToken<T>(call: (token: CachedToken) => Promise<T>): Promise<T> {
    return withToken(this.auth, call);
  }
}
