#!/usr/bin/env node
import { Command } from 'commander';
import { registerProjectCommands } from './commands/project';
import { registerApplicationCommands } from './commands/application';
import { registerOfficerCommands } from './commands/officer';
import { registerRequestCommands } from './commands/request';
import { registerEnquiryCommands } from './commands/enquiry';
import { registerReportCommands } from './commands/report';

const program = new Command();

program
  .name('flat-alloc')
  .description('Housing project flat allocation: applications, bookings, officer registrations')
  .version('1.0.0')
  .option('--as <userId>', 'User acting for this command')
  .option('--today <date>', 'Override the current date (YYYY-MM-DD)')
  .option('--data-dir <dir>', 'Directory holding the CSV data files')
  .option('--policy <path>', 'Policy file (defaults to POLICY_PATH)')
  .option('--dry-run', 'Run the command without saving changes');

// Register command modules
registerProjectCommands(program);
registerApplicationCommands(program);
registerOfficerCommands(program);
registerRequestCommands(program);
registerEnquiryCommands(program);
registerReportCommands(program);

// Parse and execute
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
