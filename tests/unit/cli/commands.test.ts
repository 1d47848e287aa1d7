import { describe, it, expect, vi } from 'vitest';
import { isCliCommand, runCommand } from '../../../src/cli/commands.js';
import { ValidationError } from '../../../src/shared/errors.js';
import { activeJobs, jobInfo } from '../../fixtures/datacloud-responses.js';

function makeClient() {
  return {
    listActiveJobs: vi.fn(async () => activeJobs),
    listJobs: vi.fn(async () => activeJobs),
    getJobInfo: vi.fn(async (jobId: string) => jobInfo({ id: jobId })),
    abortJob: vi.fn(async (jobId: string) => jobInfo({ id: jobId, state: 'Aborted' })),
    abortAllJobs: vi.fn(async () => ['job-1', 'job-2']),
  };
}

describe('runCommand', () => {
  it('list_active_jobs lists active jobs', async () => {
    const client = makeClient();
    await expect(runCommand(client, 'list_active_jobs')).resolves.toBe(activeJobs);
    expect(client.listActiveJobs).toHaveBeenCalledOnce();
  });

  it('list_all_jobs lists without a state filter', async () => {
    const client = makeClient();
    await runCommand(client, 'list_all_jobs');
    expect(client.listJobs).toHaveBeenCalledWith();
  });

  it('job_info fetches the given job', async () => {
    const client = makeClient();
    await expect(runCommand(client, 'job_info', 'job-9')).resolves.toMatchObject({ id: 'job-9' });
    expect(client.getJobInfo).toHaveBeenCalledWith('job-9');
  });

  it('abort_job aborts the given job', async () => {
    const client = makeClient();
    await expect(runCommand(client, 'abort_job', 'job-9')).resolves.toMatchObject({
      id: 'job-9',
      state: 'Aborted',
    });
  });

  it('abort_all_jobs reports the aborted ids', async () => {
    const client = makeClient();
    await expect(runCommand(client, 'abort_all_jobs')).resolves.toEqual({
      aborted: ['job-1', 'job-2'],
    });
  });

  it.each(['job_info', 'abort_job'] as const)('%s requires a job id', async (command) => {
    const client = makeClient();
    await expect(runCommand(client, command)).rejects.toThrow(
      `Must specify --job_id when command is "${command}"`,
    );
    await expect(runCommand(client, command)).rejects.toThrow(ValidationError);
    expect(client.getJobInfo).not.toHaveBeenCalled();
    expect(client.abortJob).not.toHaveBeenCalled();
  });
});

describe('isCliCommand', () => {
  it('accepts known commands only', () => {
    expect(isCliCommand('job_info')).toBe(true);
    expect(isCliCommand('drop_everything')).toBe(false);
  });
});
