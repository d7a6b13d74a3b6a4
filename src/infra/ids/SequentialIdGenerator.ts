import type { IdFormat, IdGenerator } from '../../core/ports';

// Counters continue from the highest id already on disk, so reloads never reuse one
export class SequentialIdGenerator implements IdGenerator {
  private lastProject: number;
  private lastRequest: number;

  constructor(
    private readonly format: IdFormat,
    existing: { projectIDs?: Iterable<string>; requestIDs?: Iterable<string> } = {},
  ) {
    this.lastProject = highestSuffix(format.projectPrefix, existing.projectIDs ?? []);
    this.lastRequest = highestSuffix(format.requestPrefix, existing.requestIDs ?? []);
  }

  nextProjectID(): string {
    this.lastProject += 1;
    return this.render(this.format.projectPrefix, this.lastProject);
  }

  nextRequestID(): string {
    this.lastRequest += 1;
    return this.render(this.format.requestPrefix, this.lastRequest);
  }

  private render(prefix: string, value: number): string {
    return `${prefix}${String(value).padStart(this.format.width, '0')}`;
  }
}

// Ids that don't carry the prefix followed by digits are ignored
export function highestSuffix(prefix: string, ids: Iterable<string>): number {
  let highest = 0;
  for (const id of ids) {
    if (!id.startsWith(prefix)) continue;
    const suffix = id.slice(prefix.length);
    if (!/^\d+$/.test(suffix)) continue;
    highest = Math.max(highest, Number(suffix));
  }
  return highest;
}
