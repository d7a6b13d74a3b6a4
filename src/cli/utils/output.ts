import Table from 'cli-table3';
import chalk from 'chalk';
import type { Failure, Outcome } from '../../core/domain/outcome';
import type { FlatType, Project } from '../../core/domain/entities/Project';
import { FLAT_TYPES } from '../../core/domain/entities/Project';

// Empty listings print a note instead of a bare header row
export function printTable(headers: string[], rows: string[][], empty = 'Nothing to show'): void {
  if (rows.length === 0) {
    printInfo(empty);
    return;
  }
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: { head: [], border: [] },
  });
  table.push(...rows);
  console.log(table.toString());
}

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

// stderr, so piped table output stays clean
export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

// Failure values carry kind and code; show both so scripts can grep them
export function describeFailure(failure: Failure): string {
  return `${failure.message} [${failure.kind}/${failure.code}]`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Returns the value or reports the failure and exits non-zero
export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    printError(describeFailure(outcome.error));
    process.exit(1);
  }
  return outcome.value;
}

// Color coding shared by application, registration and request statuses
export function formatStatus(status: string): string {
  const colors: Record<string, typeof chalk.green> = {
    PENDING: chalk.yellow,
    SUCCESSFUL: chalk.green,
    APPROVED: chalk.green,
    BOOKED: chalk.cyan,
    DONE: chalk.gray,
    APPROVED_UNASSIGNED: chalk.magenta,
    UNSUCCESSFUL: chalk.red,
    REJECTED: chalk.red,
    WITHDRAWN: chalk.gray,
  };

  const colorFn = colors[status] || chalk.white;
  return colorFn(status);
}

// "TWO_ROOM: 3, THREE_ROOM: 0" in flat order; - when empty
export function formatFlatMap(map: ReadonlyMap<FlatType, number>, render: (n: number) => string = String): string {
  const parts = FLAT_TYPES.filter((type) => map.has(type)).map((type) => `${type}: ${render(map.get(type) ?? 0)}`);
  return parts.length ? parts.join(', ') : '-';
}

export function formatPrice(price: number | null | undefined): string {
  return price === null || price === undefined ? '-' : `$${price.toLocaleString('en-US')}`;
}

export function formatSet(values: ReadonlySet<string>): string {
  return values.size ? [...values].join(', ') : '-';
}

// Common column set for project listings
export const PROJECT_HEADERS = ['ID', 'Name', 'Neighborhoods', 'Units', 'Prices', 'Open', 'Close', 'Visible'];

export function projectRow(project: Project): string[] {
  return [
    project.projectID,
    project.name,
    formatSet(project.neighborhoods),
    formatFlatMap(project.units),
    formatFlatMap(project.price, formatPrice),
    project.openDate,
    project.closeDate,
    project.visible ? chalk.green('yes') : chalk.gray('no'),
  ];
}
