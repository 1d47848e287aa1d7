import { logger } from '../../shared/logger.js';
import { ValidationError } from '../../shared/errors.js';
import type {
  CachedToken,
  JobInfo,
  JobList,
  JobOperation,
  JobState,
  ListJobsOptions,
} from '../types.js';
import { parseJson, send } from './request.js';

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 100;

/** REST calls of the bulk Ingest API job resource. */
export class IngestJobs {
  private readonly timeoutMs: number | undefined;

  constructor(opts?: { timeoutMs?: number }) {
    this.timeoutMs = opts?.timeoutMs;
  }

  /** Open a new bulk job. */
  async create(
    token: CachedToken,
    sourceApiName: string,
    objectName: string,
    operation: JobOperation = 'upsert',
  ): Promise<JobInfo> {
    logger.info({ sourceApiName, objectName, operation }, 'Creating new job');

    const res = await send({
      operation: 'Create Job',
      method: 'POST',
      url: this.jobsUrl(token),
      accessToken: token.accessToken,
      contentType: 'application/json',
      body: JSON.stringify({ object: objectName, sourceName: sourceApiName, operation }),
      expect: [201],
      timeoutMs: this.timeoutMs,
    });

    const job = parseJson<JobInfo>(res);
    logger.info({ jobId: job.id }, 'Job created');
    return job;
  }

  /** Upload one CSV batch to an open job. */
  async uploadBatch(token: CachedToken, jobId: string, csv: string | Uint8Array): Promise<void> {
    await send({
      operation: 'Upload File',
      method: 'PUT',
      url: `${this.jobUrl(token, jobId)}/batches`,
      accessToken: token.accessToken,
      contentType: 'text/csv',
      body: csv,
      expect: [202],
      timeoutMs: this.timeoutMs,
    });
  }

  /** Move a job to UploadComplete (queue it for processing) or Aborted. */
  async close(
    token: CachedToken,
    jobId: string,
    state: Extract<JobState, 'UploadComplete' | 'Aborted'> = 'UploadComplete',
  ): Promise<JobInfo> {
    const res = await send({
      operation: state === 'Aborted' ? 'Abort Job' : 'Close Job',
      method: 'PATCH',
      url: this.jobUrl(token, jobId),
      accessToken: token.accessToken,
      contentType: 'application/json',
      body: JSON.stringify({ state }),
      expect: [200],
      timeoutMs: this.timeoutMs,
    });

    const job = parseJson<JobInfo>(res);
    logger.info({ jobId, state: job.state }, 'Job state changed');
    return job;
  }

  /** Delete a job that is no longer Open or InProgress. */
  async delete(token: CachedToken, jobId: string): Promise<void> {
    await send({
      operation: 'Delete Job',
      method: 'DELETE',
      url: this.jobUrl(token, jobId),
      accessToken: token.accessToken,
      expect: [200, 204],
      timeoutMs: this.timeoutMs,
    });
    logger.info({ jobId }, 'Job deleted');
  }

  async list(token: CachedToken, opts: ListJobsOptions = {}): Promise<JobList> {
    const limit = opts.limit ?? DEFAULT_LIST_LIMIT;
    const offset = opts.offset ?? 0;

    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError('offset must be a non-negative integer');
    }

    const params = new URLSearchParams({ limit: String(limit), offset: String(offset) });
    if (opts.orderBy) params.set('orderby', opts.orderBy);
    if (opts.states && opts.states.length > 0) params.set('states', opts.states.join(','));

    logger.info({ states: opts.states }, 'Get list of jobs');

    const res = await send({
      operation: 'List Jobs',
      method: 'GET',
      url: `${this.jobsUrl(token)}?${params.toString()}`,
      accessToken: token.accessToken,
      expect: [200],
      timeoutMs: this.timeoutMs,
    });

    return parseJson<JobList>(res);
  }

  async info(token: CachedToken, jobId: string): Promise<JobInfo> {
    logger.debug({ jobId }, 'Get job information');

    const res = await send({
      operation: 'Job Info',
      method: 'GET',
      url: this.jobUrl(token, jobId),
      accessToken: token.accessToken,
      expect: [200],
      timeoutMs: this.timeoutMs,
    });

    return parseJson<JobInfo>(res);
  }

  private jobsUrl(token: CachedToken): string {
    return `${token.instanceUrl}/api/v1/ingest/jobs`;
  }

  private jobUrl(token: CachedToken, jobId: string): string {
    if (!jobId) {
      throw new ValidationError('A job id is required');
    }
    return `${this.jobsUrl(token)}/${encodeURIComponent(jobId)}`;
  }
}
