import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { IngestJobs } from '../../../src/datacloud/client/jobs.js';
import { DataCloudError, ValidationError } from '../../../src/shared/errors.js';
import { TEST_TOKEN, activeJobs, jobInfo, jsonResponse } from '../../fixtures/datacloud-responses.js';

const JOBS_URL = 'https://tenant.c360a.salesforce.com/api/v1/ingest/jobs';

describe('IngestJobs', () => {
  let fetchSpy: MockInstance<typeof fetch>;
  let jobs: IngestJobs;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, 'fetch');
    jobs = new IngestJobs();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('create', () => {
    it('opens a job for the source object and operation', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(jobInfo(), 201));

      const job = await jobs.create(TEST_TOKEN, 'Event_API', 'runner_profiles', 'delete');

      expect(job.id).toBe('job-1');
      const [url, opts] = fetchSpy.mock.calls[0];
      expect(url).toBe(JOBS_URL);
      expect(opts?.method).toBe('POST');
      expect(JSON.parse(String(opts?.body))).toEqual({
        object: 'runner_profiles',
        sourceName: 'Event_API',
        operation: 'delete',
      });
    });

    it('treats anything but 201 as a failure', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(jobInfo(), 200));

      await expect(jobs.create(TEST_TOKEN, 'Event_API', 'runner_profiles')).rejects.toThrow(
        DataCloudError,
      );
    });
  });

  it('uploads a batch as text/csv', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(null, { status: 202 }));

    await jobs.uploadBatch(TEST_TOKEN, 'job-1', 'maid,city\n1,Wilton\n');

    const [url, opts] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${JOBS_URL}/job-1/batches`);
    expect(opts?.method).toBe('PUT');
    expect(opts?.headers).toEqual(expect.objectContaining({ 'Content-Type': 'text/csv' }));
    expect(opts?.body).toBe('maid,city\n1,Wilton\n');
  });

  it('closes a job as UploadComplete by default', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(jobInfo({ state: 'UploadComplete' })));

    const job = await jobs.close(TEST_TOKEN, 'job-1');

    expect(job.state).toBe('UploadComplete');
    const [url, opts] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${JOBS_URL}/job-1`);
    expect(opts?.method).toBe('PATCH');
    expect(JSON.parse(String(opts?.body))).toEqual({ state: 'UploadComplete' });
  });

  it('aborts a job', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(jobInfo({ state: 'Aborted' })));

    const job = await jobs.close(TEST_TOKEN, 'job-1', 'Aborted');

    expect(job.state).toBe('Aborted');
    const [, opts] = fetchSpy.mock.calls[0];
    expect(JSON.parse(String(opts?.body))).toEqual({ state: 'Aborted' });
  });

  it('deletes a job', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await jobs.delete(TEST_TOKEN, 'job-1');

    const [url, opts] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${JOBS_URL}/job-1`);
    expect(opts?.method).toBe('DELETE');
  });

  it('gets job info', async () => {
    const info = jobInfo({ state: 'JobComplete', numberRecordsProcessed: 2 });
    fetchSpy.mockResolvedValueOnce(jsonResponse(info));

    await expect(jobs.info(TEST_TOKEN, 'job-1')).resolves.toEqual(info);
    expect(fetchSpy.mock.calls[0][0]).toBe(`${JOBS_URL}/job-1`);
  });

  it('rejects an empty job id', async () => {
    await expect(jobs.info(TEST_TOKEN, '')).rejects.toThrow(ValidationError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  describe('list', () => {
    it('uses default paging when no options are given', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(activeJobs));

      const list = await jobs.list(TEST_TOKEN);

      expect(list.data.map((j) => j.id)).toEqual(['job-1', 'job-2']);
      expect(fetchSpy.mock.calls[0][0]).toBe(`${JOBS_URL}?limit=50&offset=0`);
    });

    it('passes states and ordering', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(activeJobs));

      await jobs.list(TEST_TOKEN, {
        limit: 10,
        offset: 20,
        orderBy: 'createdDate',
        states: ['Open', 'UploadComplete', 'InProgress'],
      });

      expect(fetchSpy.mock.calls[0][0]).toBe(
        `${JOBS_URL}?limit=10&offset=20&orderby=createdDate&states=Open%2CUploadComplete%2CInProgress`,
      );
    });

    it('rejects a limit above 100', async () => {
      await expect(jobs.list(TEST_TOKEN, { limit: 101 })).rejects.toThrow(ValidationError);
    });

    it('rejects a negative offset', async () => {
      await expect(jobs.list(TEST_TOKEN, { offset: -1 })).rejects.toThrow(ValidationError);
    });
  });
});
