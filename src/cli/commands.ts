import { logger } from '../shared/logger.js';
import { ValidationError } from '../shared/errors.js';
import type { DataCloudClient } from '../datacloud/client/index.js';

export const COMMANDS = [
  'list_active_jobs',
  'list_all_jobs',
  'job_info',
  'abort_job',
  'abort_all_jobs',
] as const;

export type CliCommand = (typeof COMMANDS)[number];

export const DEFAULT_COMMAND: CliCommand = 'list_active_jobs';

/** The slice of the client the CLI drives. */
export type JobCommandClient = Pick<
  DataCloudClient,
  'listActiveJobs' | 'listJobs' | 'getJobInfo' | 'abortJob' | 'abortAllJobs'
>;

export const COMMAND_HELP = `
Commands:
  list_active_jobs  (default) Show jobs with state Open, UploadComplete or InProgress
  list_all_jobs     Show all jobs
  job_info          Show detailed information for the job given by --job_id
  abort_job         Terminate the job given by --job_id with state "Aborted"
  abort_all_jobs    Abort every Open or UploadComplete job
`;

export function isCliCommand(value: string): value is CliCommand {
  return (COMMANDS as readonly string[]).includes(value);
}

/** Dispatch one command and return the API response body. */
export async function runCommand(
  client: JobCommandClient,
  command: CliCommand,
  jobId?: string,
): Promise<unknown> {
  switch (command) {
    case 'list_active_jobs':
      logger.info('Get list of active jobs');
      return client.listActiveJobs();
    case 'list_all_jobs':
      logger.info('Get list of all jobs');
      return client.listJobs();
    case 'job_info':
      return client.getJobInfo(requireJobId(command, jobId));
    case 'abort_job':
      return client.abortJob(requireJobId(command, jobId));
    case 'abort_all_jobs':
      return { aborted: await client.abortAllJobs() };
  }
}

function requireJobId(command: CliCommand, jobId: string | undefined): string {
  if (!jobId) {
    throw new ValidationError(`Must specify --job_id when command is "${command}"`);
  }
  return jobId;
}
