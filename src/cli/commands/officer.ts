import { Command } from 'commander';
import { getCliContext } from '../container';
import {
  errorMessage,
  formatPrice,
  formatStatus,
  printError,
  printInfo,
  printSuccess,
  printTable,
  unwrap,
} from '../utils/output';

// Register officer commands (register, registrations, book)
export function registerOfficerCommands(program: Command): void {
  const officerCmd = program.command('officer').description('Officer commands');

  officerCmd
    .command('register <projectId>')
    .description('Ask to handle a project as an officer')
    .action((projectId: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const request = unwrap(app.orchestrator.registerOfficer(session, projectId));
        printSuccess(`Registration ${request.requestID} for ${projectId} is pending approval`);
      } catch (error) {
        printError(`Failed to register: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  officerCmd
    .command('registrations')
    .description('Show your registration status per project')
    .action((_options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const officer = app.graph.officers.get(session.userID);
        if (!officer || officer.registrationStatusByProject.size === 0) {
          printInfo('No registrations yet');
          return;
        }
        printTable(
          ['Project', 'Status', 'Assigned'],
          [...officer.registrationStatusByProject].map(([projectID, status]) => [
            projectID,
            formatStatus(status),
            officer.registeredProjectIDs.has(projectID) ? 'yes' : 'no',
          ]),
        );
      } catch (error) {
        printError(`Failed to show registrations: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  // book takes a unit out of inventory for a SUCCESSFUL applicant
  officerCmd
    .command('book <applicantId>')
    .description('Book the flat of a successful applicant')
    .action((applicantId: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const booking = unwrap(app.orchestrator.bookFlat(session, applicantId));
        printSuccess(
          `Booked ${booking.flatType} in ${booking.projectID} for ${booking.applicantID} (${booking.unitsRemaining} left)`,
        );
        const receipts = unwrap(app.orchestrator.bookingReceipts(session, booking.projectID)).filter(
          (r) => r.applicant.userID === booking.applicantID,
        );
        receipts.forEach((r) => printInfo(`Receipt: ${r.applicant.name}, ${r.project.name}, ${formatPrice(r.price)}`));
      } catch (error) {
        printError(`Failed to book flat: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
