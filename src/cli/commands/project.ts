import { Command } from 'commander';
import type { FlatType, ProjectParams, ProjectPatch } from '../../core/domain/entities/Project';
import type { FilterCriteria } from '../../core/application/services';
import { getCliContext } from '../container';
import {
  parseAmount,
  parseApplicationStatus,
  parseCount,
  parseDate,
  parseFlatType,
  parseList,
  parseSortKey,
} from '../utils/parse';
import {
  PROJECT_HEADERS,
  errorMessage,
  formatStatus,
  printError,
  printInfo,
  printSuccess,
  printTable,
  projectRow,
  unwrap,
} from '../utils/output';

interface FilterOptions {
  location?: string;
  minPrice?: string;
  maxPrice?: string;
  flatType?: string;
  from?: string;
  to?: string;
  sort?: string;
  scope?: string;
}

interface ProjectOptions {
  name?: string;
  neighborhoods?: string;
  twoRoomUnits?: string;
  threeRoomUnits?: string;
  twoRoomPrice?: string;
  threeRoomPrice?: string;
  open?: string;
  close?: string;
  slots?: string;
  hidden?: boolean;
}

// Register project commands (list, create, edit, toggle, delete, applicants)
export function registerProjectCommands(program: Command): void {
  const projectCmd = program.command('project').description('Housing project commands');

  // list shows the view that fits the acting role unless --scope says otherwise
  projectCmd
    .command('list')
    .description('List projects, filtered and sorted')
    .option('-l, --location <names>', 'Comma-separated neighborhoods')
    .option('--min-price <amount>', 'Lowest acceptable price')
    .option('--max-price <amount>', 'Highest acceptable price')
    .option('-f, --flat-type <type>', 'Only projects with units of this flat type')
    .option('--from <date>', 'Opening on or after this date')
    .option('--to <date>', 'Closing on or before this date')
    .option('-s, --sort <key>', 'Sort by NAME, PRICE or DATE', 'NAME')
    .option('--scope <scope>', 'applicable, registrable, registered, managed or all')
    .action((options: FilterOptions, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const criteria = toCriteria(options);
        const scope = options.scope ?? (session.role === 'MANAGER' ? 'all' : 'applicable');
        const { orchestrator } = app;

        if (scope === 'applicable') {
          const rows = unwrap(orchestrator.applicableProjects(session, criteria));
          printTable(
            [...PROJECT_HEADERS, 'Eligible up to'],
            rows.map(({ project, maxFlatType }) => [...projectRow(project), maxFlatType]),
          );
          return;
        }

        const projects =
          scope === 'registrable'
            ? orchestrator.registrableProjects(session, criteria)
            : scope === 'registered'
              ? orchestrator.registeredProjects(session, criteria)
              : scope === 'managed'
                ? orchestrator.managedProjects(session, criteria)
                : scope === 'all'
                  ? orchestrator.allProjects(session, criteria)
                  : null;
        if (!projects) {
          throw new Error(`Unknown scope "${scope}"`);
        }
        printTable(PROJECT_HEADERS, unwrap(projects).map(projectRow), 'No projects match');
      } catch (error) {
        printError(`Failed to list projects: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  withProjectOptions(projectCmd.command('create').description('Create a project managed by the acting manager'))
    .action((options: ProjectOptions, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const project = unwrap(app.orchestrator.createProject(session, toParams(options)));
        printSuccess(`Created ${project.projectID} (${project.name})`);
      } catch (error) {
        printError(`Failed to create project: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  withProjectOptions(projectCmd.command('edit <projectId>').description('Replace fields of a project'))
    .option('--visible', 'Make the project visible')
    .action((projectId: string, options: ProjectOptions & { visible?: boolean }, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const patch = toPatch(options);
        if (Object.keys(patch).length === 0) {
          printInfo('Nothing to change');
          return;
        }
        const project = unwrap(app.orchestrator.editProject(session, projectId, patch));
        printSuccess(`Updated ${project.projectID}`);
      } catch (error) {
        printError(`Failed to edit project: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  projectCmd
    .command('toggle <projectId>')
    .description('Flip project visibility')
    .action((projectId: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const project = unwrap(app.orchestrator.toggleVisibility(session, projectId));
        printSuccess(`${project.projectID} is now ${project.visible ? 'visible' : 'hidden'}`);
      } catch (error) {
        printError(`Failed to toggle visibility: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  projectCmd
    .command('delete <projectId>')
    .description('Delete a project and everything that points at it')
    .action((projectId: string, _options: unknown, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const report = unwrap(app.orchestrator.deleteProject(session, projectId));
        printSuccess(`Deleted ${report.project.projectID} (${report.project.name})`);
        printTable(
          ['Removed requests', 'Unlinked applicants', 'Rejected officers'],
          [
            [
              String(report.removedRequestIDs.length),
              report.unlinkedApplicantIDs.join(', ') || '-',
              report.rejectedOfficerIDs.join(', ') || '-',
            ],
          ],
        );
      } catch (error) {
        printError(`Failed to delete project: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  projectCmd
    .command('applicants <projectId>')
    .description('Applicants currently linked to a project')
    .option('--status <status>', 'Only applicants with this application status')
    .action((projectId: string, options: { status?: string }, cmd: Command) => {
      try {
        const { app, session } = getCliContext(cmd);
        const status = options.status ? parseApplicationStatus(options.status) : undefined;
        const applicants = unwrap(app.orchestrator.applicantsOnProject(session, projectId, status));
        printTable(
          ['User', 'Name', 'Age', 'Marital', 'Flat', 'Status'],
          applicants.map((a) => [
            a.userID,
            a.name,
            String(a.age),
            a.maritalStatus,
            a.appliedFlatByProject.get(projectId) ?? '-',
            formatStatus(a.applicationStatusByProject.get(projectId) ?? '-'),
          ]),
        );
      } catch (error) {
        printError(`Failed to list applicants: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}

function withProjectOptions(cmd: Command): Command {
  return cmd
    .option('-n, --name <name>', 'Project name')
    .option('--neighborhoods <names>', 'Comma-separated neighborhoods')
    .option('--two-room-units <count>', 'Number of 2-room units')
    .option('--three-room-units <count>', 'Number of 3-room units')
    .option('--two-room-price <amount>', 'Price of a 2-room unit')
    .option('--three-room-price <amount>', 'Price of a 3-room unit')
    .option('--open <date>', 'Application opening date (YYYY-MM-DD)')
    .option('--close <date>', 'Application closing date (YYYY-MM-DD)')
    .option('--slots <count>', 'Officer slots')
    .option('--hidden', 'Keep the project hidden from applicants');
}

function toCriteria(options: FilterOptions): FilterCriteria {
  return {
    locations: options.location ? parseList(options.location) : undefined,
    minPrice: options.minPrice !== undefined ? parseAmount(options.minPrice) : undefined,
    maxPrice: options.maxPrice !== undefined ? parseAmount(options.maxPrice) : undefined,
    flatType: options.flatType ? parseFlatType(options.flatType) : undefined,
    startDate: options.from ? parseDate(options.from) : undefined,
    endDate: options.to ? parseDate(options.to) : undefined,
    sortBy: options.sort ? parseSortKey(options.sort) : undefined,
  };
}

function flatValues(
  two: string | undefined,
  three: string | undefined,
  parse: (raw: string) => number,
): Partial<Record<FlatType, number>> | undefined {
  if (two === undefined && three === undefined) return undefined;
  const values: Partial<Record<FlatType, number>> = {};
  if (two !== undefined) values.TWO_ROOM = parse(two);
  if (three !== undefined) values.THREE_ROOM = parse(three);
  return values;
}

function toParams(options: ProjectOptions): ProjectParams {
  const { name, open, close, slots } = options;
  if (!name || !open || !close || slots === undefined) {
    throw new Error('--name, --open, --close and --slots are required');
  }
  return {
    name,
    neighborhoods: options.neighborhoods ? parseList(options.neighborhoods) : [],
    units: flatValues(options.twoRoomUnits, options.threeRoomUnits, parseCount) ?? {},
    price: flatValues(options.twoRoomPrice, options.threeRoomPrice, parseAmount) ?? {},
    openDate: parseDate(open),
    closeDate: parseDate(close),
    officerSlots: parseCount(slots),
    visible: !options.hidden,
  };
}

// Only flags that were passed end up in the patch
function toPatch(options: ProjectOptions & { visible?: boolean }): ProjectPatch {
  const patch: ProjectPatch = {};
  if (options.name) patch.name = options.name;
  if (options.neighborhoods) patch.neighborhoods = parseList(options.neighborhoods);
  const units = flatValues(options.twoRoomUnits, options.threeRoomUnits, parseCount);
  if (units) patch.units = units;
  const price = flatValues(options.twoRoomPrice, options.threeRoomPrice, parseAmount);
  if (price) patch.price = price;
  if (options.open) patch.openDate = parseDate(options.open);
  if (options.close) patch.closeDate = parseDate(options.close);
  if (options.slots !== undefined) patch.officerSlotsRemaining = parseCount(options.slots);
  if (options.hidden) patch.visible = false;
  if (options.visible) patch.visible = true;
  return patch;
}
