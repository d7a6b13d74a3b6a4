import { Command } from 'commander';
import { getCliContext } from '../container';
import { parseCount, parseFlatType, parseMaritalStatus } from '../utils/parse';
import { errorMessage, formatPrice, printError, printInfo, printTable, unwrap } from '../utils/output';

interface ApplicantReportOptions {
  minAge: string;
  maxAge: string;
  marital: string;
  flatType: string;
}

// Register report commands (applicants, receipts)
export function registerReportCommands(program: Command): void {
  const reportCmd = program.command('report').description('Reports for managers and officers');

  reportCmd
    .command('applicants <projectId>')
    .description('Applicants on a project by age band, marital status and flat type')
    .option('--min-age <age>', 'Youngest age to include', '0')
    .option('--max-age <age>', 'Oldest age to include', '200')
    .requiredOption('--marital <status>', 'SINGLE or MARRIED')
    .requiredOption('-f, --flat-type <type>', 'Applied flat type')
    .action((projectId: string, options: ApplicantReportOptions, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const applicants = unwrap(
          app.orchestrator.applicantReport(session, {
            projectID: projectId,
            minAge: parseCount(options.minAge),
            maxAge: parseCount(options.maxAge),
            maritalStatus: parseMaritalStatus(options.marital),
            flatType: parseFlatType(options.flatType),
          }),
        );
        if (applicants.length === 0) {
          printInfo('No applicants match');
          return;
        }
        printTable(
          ['User', 'Name', 'Age', 'Marital', 'Status'],
          applicants.map((a) => [
            a.userID,
            a.name,
            String(a.age),
            a.maritalStatus,
            a.applicationStatusByProject.get(projectId) ?? '-',
          ]),
        );
      } catch (error) {
        printError(`Failed to build report: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  reportCmd
    .command('receipts [projectId]')
    .description('Booking receipts for projects you are registered on')
    .action((projectId: string | undefined, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const receipts = unwrap(app.orchestrator.bookingReceipts(session, projectId));
        if (receipts.length === 0) {
          printInfo('No bookings yet');
          return;
        }
        printTable(
          ['Applicant', 'Name', 'Age', 'Marital', 'Project', 'Neighborhoods', 'Flat', 'Price'],
          receipts.map((r) => [
            r.applicant.userID,
            r.applicant.name,
            String(r.applicant.age),
            r.applicant.maritalStatus,
            r.project.name,
            [...r.project.neighborhoods].join(', '),
            r.flatType,
            formatPrice(r.price),
          ]),
        );
      } catch (error) {
        printError(`Failed to list receipts: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
