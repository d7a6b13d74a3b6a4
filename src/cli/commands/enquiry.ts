import { Command } from 'commander';
import type { EnquiryRequest } from '../../core/domain/entities/Request';
import { getCliContext } from '../container';
import { errorMessage, formatStatus, printError, printInfo, printSuccess, printTable, unwrap } from '../utils/output';

// Register enquiry commands (submit, edit, delete, answer, list)
export function registerEnquiryCommands(program: Command): void {
  const enquiryCmd = program.command('enquiry').description('Project enquiry commands');

  enquiryCmd
    .command('submit <projectId> <text>')
    .description('Ask a question about a project')
    .action((projectId: string, text: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const enquiry = unwrap(app.orchestrator.submitEnquiry(session, projectId, text));
        printSuccess(`Enquiry ${enquiry.requestID} submitted`);
      } catch (error) {
        printError(`Failed to submit enquiry: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  enquiryCmd
    .command('edit <requestId> <text>')
    .description('Reword an enquiry that has not been answered')
    .action((requestId: string, text: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        unwrap(app.orchestrator.editEnquiry(session, requestId, text));
        printSuccess(`Enquiry ${requestId} updated`);
      } catch (error) {
        printError(`Failed to edit enquiry: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  enquiryCmd
    .command('delete <requestId>')
    .description('Delete an enquiry that has not been answered')
    .action((requestId: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        unwrap(app.orchestrator.deleteEnquiry(session, requestId));
        printSuccess(`Enquiry ${requestId} deleted`);
      } catch (error) {
        printError(`Failed to delete enquiry: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  enquiryCmd
    .command('answer <requestId> <text>')
    .description('Answer an enquiry on a project you handle')
    .action((requestId: string, text: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        unwrap(app.orchestrator.answerEnquiry(session, requestId, text));
        printSuccess(`Enquiry ${requestId} answered`);
      } catch (error) {
        printError(`Failed to answer enquiry: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  // mine: your own; handled: projects you are on; all: managers only
  enquiryCmd
    .command('list')
    .description('List enquiries')
    .option('--scope <scope>', 'mine, handled or all', 'mine')
    .action((options: { scope: string }, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const { orchestrator } = app;
        const listed =
          options.scope === 'handled'
            ? orchestrator.handledEnquiries(session)
            : options.scope === 'all'
              ? orchestrator.allEnquiries(session)
              : orchestrator.myEnquiries(session);
        const enquiries = unwrap(listed);
        if (enquiries.length === 0) {
          printInfo('No enquiries');
          return;
        }
        printTable(['Request', 'User', 'Project', 'Query', 'Answer', 'Status'], enquiries.map(enquiryRow));
      } catch (error) {
        printError(`Failed to list enquiries: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}

function enquiryRow(e: EnquiryRequest): string[] {
  const answer = e.answer ? `${e.answer} (${e.answeredBy ?? '?'})` : '-';
  return [e.requestID, e.userID, e.projectID, e.query, answer, formatStatus(e.overallStatus)];
}
