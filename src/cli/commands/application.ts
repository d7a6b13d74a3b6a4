import { Command } from 'commander';
import { getCliContext } from '../container';
import { parseFlatType } from '../utils/parse';
import { errorMessage, formatStatus, printError, printInfo, printSuccess, printTable, unwrap } from '../utils/output';

// Register applicant-side commands (submit, withdraw, status)
export function registerApplicationCommands(program: Command): void {
  const applicationCmd = program.command('application').description('Flat application commands');

  applicationCmd
    .command('submit <projectId> <flatType>')
    .description('Apply for a flat type in a project (2, 3, TWO_ROOM or THREE_ROOM)')
    .action((projectId: string, flatType: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const request = unwrap(app.orchestrator.submitApplication(session, projectId, parseFlatType(flatType)));
        printSuccess(`Application ${request.requestID} submitted for ${request.flatType} in ${projectId}`);
      } catch (error) {
        printError(`Failed to submit application: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  applicationCmd
    .command('withdraw <projectId>')
    .description('Ask to withdraw the application for a project')
    .action((projectId: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const request = unwrap(app.orchestrator.withdrawApplication(session, projectId));
        printSuccess(`Withdrawal ${request.requestID} filed; awaiting manager approval`);
      } catch (error) {
        printError(`Failed to withdraw: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  // Application and withdrawal requests filed under the acting user id
  applicationCmd
    .command('status')
    .description('Show your application history')
    .action((_options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const requests = unwrap(app.orchestrator.myRequests(session)).filter(
          (r) => r.type === 'BTO_APPLICATION' || r.type === 'BTO_WITHDRAWAL',
        );
        if (requests.length === 0) {
          printInfo('No applications yet');
          return;
        }
        printTable(
          ['Request', 'Type', 'Project', 'Flat', 'Approval', 'Overall'],
          requests.map((r) => [
            r.requestID,
            r.type,
            r.projectID,
            r.type === 'ENQUIRY' || r.type === 'REGISTRATION' ? '-' : (r.flatType ?? '-'),
            r.type === 'ENQUIRY' ? '-' : formatStatus(r.approval),
            formatStatus(r.overallStatus),
          ]),
        );
      } catch (error) {
        printError(`Failed to show applications: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
