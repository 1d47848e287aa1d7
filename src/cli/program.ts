import { Command, Option } from 'commander';
import { COMMANDS, COMMAND_HELP, DEFAULT_COMMAND, isCliCommand, runCommand } from './commands.js';
import type { JobCommandClient } from './commands.js';
import { ValidationError } from '../shared/errors.js';

export interface ProgramDeps {
  createClient: () => Promise<JobCommandClient>;
  write: (text: string) => void;
}

interface ProgramOptions {
  command: string;
  job_id?: string;
}

export function createProgram(deps: ProgramDeps): Command {
  const program = new Command();

  program
    .name('datacloud')
    .description('Manage Salesforce Data Cloud bulk ingest jobs')
    .addOption(
      new Option('--command <command>', 'Select the operation to execute')
        .choices(COMMANDS)
        .default(DEFAULT_COMMAND),
    )
    .option('--job_id <jobId>', 'The job id returned in the response body from the Create Job request')
    .addHelpText('after', COMMAND_HELP)
    .action(async (opts: ProgramOptions) => {
      if (!isCliCommand(opts.command)) {
        throw new ValidationError(`Invalid command: ${opts.command}`);
      }
      const client = await deps.createClient();
      const result = await runCommand(client, opts.command, opts.job_id);
      deps.write(`${JSON.stringify(result, null, 2)}\n`);
    });

  return program;
}
