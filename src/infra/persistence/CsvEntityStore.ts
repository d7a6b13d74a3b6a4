import fs from 'fs';
import path from 'path';
import type { EntityKind, EntityKinds, EntityStore } from '../../core/ports';
import { AllocationError } from '../../core/domain/outcome';
import { decodeAll, encodeAll } from './csvCodec';

// One CSV file per entity kind under a data directory
// A missing file is an empty collection; the directory is created on first save
export class CsvEntityStore implements EntityStore {
  constructor(
    private readonly dataDir: string,
    private readonly files: Record<EntityKind, string>,
  ) {}

  loadAll<K extends EntityKind>(kind: K): EntityKinds[K][] {
    const target = this.pathFor(kind);
    if (!fs.existsSync(target)) {
      return [];
    }
    let text: string;
    try {
      text = fs.readFileSync(target, 'utf-8');
    } catch (error) {
      throw new AllocationError(`Failed to read ${target}`, 'STORE_READ', { cause: error });
    }
    return decodeAll(kind, text, target);
  }

  saveAll<K extends EntityKind>(kind: K, items: EntityKinds[K][]): void {
    const target = this.pathFor(kind);
    // Write then rename so a crash never leaves a half-written file behind
    const staging = `${target}.tmp`;
    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(staging, `${encodeAll(kind, items)}\n`, 'utf-8');
      fs.renameSync(staging, target);
    } catch (error) {
      throw new AllocationError(`Failed to write ${target}`, 'STORE_WRITE', { cause: error });
    }
  }

  pathFor(kind: EntityKind): string {
    return path.resolve(this.dataDir, this.files[kind]);
  }
}
