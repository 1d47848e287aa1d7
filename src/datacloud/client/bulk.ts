import { mkdir, mkdtemp, readFile, rm } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { logger } from '../../shared/logger.js';
import { JobTimeoutError } from '../../shared/errors.js';
import { splitCsvFile } from '../split/file-splitter.js';
import { TERMINAL_JOB_STATES } from '../types.js';
import type { JobInfo, JobOperation, WaitForJobOptions } from '../types.js';

export const BULK_API_MAX_PAYLOAD_SIZE = 150 * 1000 * 1000;

const DEFAULT_POLL_INTERVAL_MS = 5_000;
const DEFAULT_WAIT_TIMEOUT_MS = 30 * 60 * 1000;

/** The job calls the bulk lifecycle is built from. */
export interface BulkJobApi {
  createJob(sourceApiName: string, objectName: string, operation: JobOperation): Promise<JobInfo>;
  uploadJobData(jobId: string, csv: Uint8Array): Promise<void>;
  closeJob(jobId: string): Promise<JobInfo>;
  abortJob(jobId: string): Promise<JobInfo>;
  getJobInfo(jobId: string): Promise<JobInfo>;
}

export type FilePaths = Iterable<string> | AsyncIterable<string>;

export interface BulkIngestOptions {
  tempDir: string;
  inputFileEncoding?: string;
  /** Upper bound for one uploaded part (default: 150 MB) */
  maxPartBytes?: number;
}

/**
 * Drives one bulk job from creation to UploadComplete: every input file is
 * split into upload-sized parts and each part becomes a batch of the job.
 * A failure anywhere after the job is opened aborts it.
 */
export class BulkIngest {
  private readonly tempDir: string;
  private readonly encoding: string | undefined;
  private readonly maxPartBytes: number;

  constructor(
    private readonly api: BulkJobApi,
    opts: BulkIngestOptions,
  ) {
    this.tempDir = opts.tempDir;
    this.encoding = opts.inputFileEncoding;
    this.maxPartBytes = opts.maxPartBytes ?? BULK_API_MAX_PAYLOAD_SIZE;
  }

  async run(
    sourceApiName: string,
    objectName: string,
    filePaths: FilePaths,
    operation: JobOperation,
  ): Promise<JobInfo> {
    const job = await this.api.createJob(sourceApiName, objectName, operation);
    let workDir: string | undefined;

    try {
      // Parts of concurrent runs never share a directory
      await mkdir(this.tempDir, { recursive: true });
      workDir = await mkdtemp(path.join(this.tempDir, 'datacloud-'));
      let uploaded = 0;

      for await (const filePath of filePaths) {
        logger.info({ jobId: job.id, filePath }, 'Processing file');

        const parts = splitCsvFile(filePath, {
          maxBytes: this.maxPartBytes,
          tempDir: workDir,
          encoding: this.encoding,
        });

        for await (const part of parts) {
          logger.info({ jobId: job.id, part: part.path, size: part.size }, 'Uploading file part');
          try {
            await this.api.uploadJobData(job.id, await readFile(part.path));
            uploaded += 1;
          } finally {
            await rm(part.path, { force: true });
          }
        }
      }

      if (uploaded === 0) {
        logger.warn({ jobId: job.id }, 'No data rows uploaded, closing an empty job');
      }

      const closed = await this.api.closeJob(job.id);
      logger.info({ jobId: job.id, parts: uploaded, state: closed.state }, 'Bulk upload complete');
      return closed;
    } catch (err: unknown) {
      await this.abortAfterFailure(job.id);
      throw err;
    } finally {
      if (workDir) await rm(workDir, { recursive: true, force: true });
    }
  }

  /** Poll a job until it reaches JobComplete, Failed or Aborted. */
  async waitForJob(jobId: string, opts?: WaitForJobOptions): Promise<JobInfo> {
    const intervalMs = opts?.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const timeoutMs = opts?.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const job = await this.api.getJobInfo(jobId);
      if (TERMINAL_JOB_STATES.includes(job.state)) {
        logger.info({ jobId, state: job.state }, 'Job finished');
        return job;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new JobTimeoutError(jobId, job.state);
      }
      logger.debug({ jobId, state: job.state }, 'Job still running');
      await sleep(Math.min(intervalMs, remaining));
    }
  }

  private async abortAfterFailure(jobId: string): Promise<void> {
    logger.warn({ jobId }, 'Bulk upload failed, aborting job');
    try {
      await this.api.abortJob(jobId);
    } catch (abortErr: unknown) {
      logger.error({ err: abortErr, jobId }, 'Could not abort job');
    }
  }
}
