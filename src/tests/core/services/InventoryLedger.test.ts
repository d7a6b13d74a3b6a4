import { describe, it, expect } from 'vitest';
import { InventoryLedger } from '../../../core/application/services/InventoryLedger';
import { createProject, flats } from '../../helpers/fixtures';

describe('InventoryLedger', () => {
  const ledger = new InventoryLedger();

  it('reserves one unit and records the holder', () => {
    const project = createProject({ units: flats(1, 0) });

    const result = ledger.reserve(project, 'TWO_ROOM', 'A1');

    expect(result).toEqual({ ok: true, value: { projectID: 'P1', flatType: 'TWO_ROOM', remaining: 0 } });
    expect(project.units.get('TWO_ROOM')).toBe(0);
    expect(project.bookedApplicantIDs.has('A1')).toBe(true);
  });

  it('refuses a second unit for the same applicant without touching counts', () => {
    const project = createProject({ units: flats(2, 0) });
    ledger.reserve(project, 'TWO_ROOM', 'A1');

    const again = ledger.reserve(project, 'TWO_ROOM', 'A1');

    expect(again.ok).toBe(false);
    if (!again.ok) expect(again.error.code).toBe('AlreadyBooked');
    expect(project.units.get('TWO_ROOM')).toBe(1);
  });

  it('reports NoUnitsAvailable when the flat type is sold out', () => {
    const project = createProject({ units: flats(0, 0) });

    const result = ledger.reserve(project, 'TWO_ROOM', 'A1');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'ResourceExhausted', code: 'NoUnitsAvailable', message: 'No TWO_ROOM units left in P1' },
    });
    expect(project.units.get('TWO_ROOM')).toBe(0);
  });

  it('releases only units the applicant actually holds', () => {
    const project = createProject({ units: flats(1, 0) });
    ledger.reserve(project, 'TWO_ROOM', 'A1');

    expect(ledger.release(project, 'TWO_ROOM', 'A1')).toEqual({ projectID: 'P1', flatType: 'TWO_ROOM', remaining: 1 });
    expect(ledger.release(project, 'TWO_ROOM', 'A1')).toBeNull();
    expect(ledger.release(project, 'TWO_ROOM', 'A2')).toBeNull();
    expect(project.units.get('TWO_ROOM')).toBe(1);
    expect(project.bookedApplicantIDs.size).toBe(0);
  });

  it('treats a missing flat type as zero units', () => {
    const project = createProject({ units: new Map() });
    expect(ledger.available(project, 'THREE_ROOM')).toBe(0);
    expect(ledger.hasUnits(project, 'THREE_ROOM')).toBe(false);
  });
});
