import { Command } from 'commander';
import type { Request } from '../../core/domain/entities/Request';
import { getCliContext } from '../container';
import { parseDecision, parseRequestType } from '../utils/parse';
import {
  errorMessage,
  formatStatus,
  printError,
  printInfo,
  printSuccess,
  printTable,
  printWarning,
  unwrap,
} from '../utils/output';

const REQUEST_HEADERS = ['Request', 'Type', 'User', 'Project', 'Detail', 'Approval', 'Overall'];

function requestRow(r: Request): string[] {
  const detail =
    r.type === 'BTO_APPLICATION'
      ? r.flatType
      : r.type === 'BTO_WITHDRAWAL'
        ? `was ${r.priorStatus}`
        : r.type === 'ENQUIRY'
          ? r.query
          : '-';
  const approval = r.type === 'ENQUIRY' ? '-' : formatStatus(r.approval);
  return [r.requestID, r.type, r.userID, r.projectID, detail, approval, formatStatus(r.overallStatus)];
}

// Register request commands (mine, pending, decide)
export function registerRequestCommands(program: Command): void {
  const requestCmd = program.command('request').description('Request review commands');

  requestCmd
    .command('mine')
    .description('Every request you have filed')
    .action((_options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const requests = unwrap(app.orchestrator.myRequests(session));
        printTable(REQUEST_HEADERS, requests.map(requestRow), 'No requests');
      } catch (error) {
        printError(`Failed to list requests: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  requestCmd
    .command('pending')
    .description('Undecided requests on projects you manage')
    .option('-t, --type <type>', 'BTO_APPLICATION, BTO_WITHDRAWAL or REGISTRATION')
    .action((options: { type?: string }, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const type = options.type ? parseRequestType(options.type) : undefined;
        const requests = unwrap(app.orchestrator.pendingRequests(session, type));
        printTable(REQUEST_HEADERS, requests.map(requestRow), 'Nothing waiting for a decision');
      } catch (error) {
        printError(`Failed to list pending requests: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  requestCmd
    .command('decide <requestId> <decision>')
    .description('Decide a request: approve, reject or pending')
    .action((requestId: string, decision: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const decided = unwrap(app.orchestrator.decideRequest(session, requestId, parseDecision(decision)));

        switch (decided.type) {
          case 'BTO_APPLICATION': {
            const { status, released } = decided.result;
            printSuccess(`Application ${requestId} is now ${formatStatus(status)}`);
            if (released) printInfo(`Released one ${released.flatType} unit (${released.remaining} left)`);
            break;
          }
          case 'BTO_WITHDRAWAL': {
            const { request, released } = decided.result;
            printSuccess(`Withdrawal ${requestId} is ${formatStatus(request.approval)}`);
            if (request.approval === 'UNSUCCESSFUL') {
              printWarning(`${request.userID} stays unlinked from ${request.projectID} and may apply again`);
            }
            if (released) printInfo(`Released one ${released.flatType} unit (${released.remaining} left)`);
            break;
          }
          case 'REGISTRATION': {
            const { status, slotsRemaining } = decided.result;
            printSuccess(`Registration ${requestId} is now ${formatStatus(status)} (${slotsRemaining} slots left)`);
            break;
          }
        }
      } catch (error) {
        printError(`Failed to decide request: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
