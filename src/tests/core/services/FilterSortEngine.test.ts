import { describe, it, expect } from 'vitest';
import { FilterSortEngine } from '../../../core/application/services/FilterSortEngine';
import type { FlatType } from '../../../core/domain/entities/Project';
import { createProject, flats } from '../../helpers/fixtures';

const engine = new FilterSortEngine();

const acacia = createProject({
  projectID: 'P1',
  name: 'Acacia Breeze',
  neighborhoods: new Set(['Yishun']),
  units: flats(2, 3),
  price: flats(350000, 450000),
  openDate: '2025-02-15',
  closeDate: '2025-03-20',
});
const maple = createProject({
  projectID: 'P2',
  name: 'Maple Heights',
  neighborhoods: new Set(['Tampines', 'Pasir Ris']),
  units: flats(0, 5),
  price: new Map<FlatType, number>([['THREE_ROOM', 520000]]),
  openDate: '2025-06-01',
  closeDate: '2025-07-31',
});
const cedar = createProject({
  projectID: 'P3',
  name: 'Cedar Court',
  neighborhoods: new Set(['Bedok']),
  units: flats(4, 0),
  price: flats(280000, 390000),
  openDate: '2025-01-10',
  closeDate: '2025-02-10',
});
const empty = createProject({
  projectID: 'P4',
  name: 'Birch Rise',
  units: flats(0, 0),
  openDate: '2025-04-01',
  closeDate: '2025-04-30',
});
const all = [acacia, maple, cedar, empty];

const ids = (projects: { projectID: string }[]) => projects.map((p) => p.projectID);

describe('FilterSortEngine', () => {
  it('drops sold-out projects and sorts by name by default', () => {
    expect(ids(engine.apply(all))).toEqual(['P1', 'P3', 'P2']);
  });

  it('keeps only projects with units of the chosen flat type', () => {
    expect(ids(engine.apply(all, { flatType: 'TWO_ROOM' }))).toEqual(['P1', 'P3']);
    expect(ids(engine.apply(all, { flatType: 'THREE_ROOM' }))).toEqual(['P1', 'P2']);
  });

  it('matches any of the requested neighborhoods', () => {
    expect(ids(engine.apply(all, { locations: ['Pasir Ris', 'Bedok'] }))).toEqual(['P3', 'P2']);
  });

  it('applies price bounds to both flat prices', () => {
    expect(ids(engine.apply(all, { maxPrice: 400000 }))).toEqual(['P3']);
    expect(ids(engine.apply(all, { minPrice: 300000 }))).toEqual(['P1']);
    expect(ids(engine.apply(all, { minPrice: 400000 }))).toEqual([]);
  });

  it('checks both prices even when a flat type is chosen', () => {
    expect(ids(engine.apply(all, { flatType: 'THREE_ROOM', maxPrice: 460000 }))).toEqual(['P1']);
    expect(ids(engine.apply(all, { flatType: 'TWO_ROOM', minPrice: 300000 }))).toEqual(['P1']);
  });

  it('treats a missing price as out of bounds', () => {
    expect(ids(engine.apply(all, { flatType: 'THREE_ROOM', minPrice: 1 }))).toEqual(['P1']);
    expect(ids(engine.apply([maple], { maxPrice: 600000 }))).toEqual([]);
  });

  it('keeps projects whose window sits inside the date range', () => {
    expect(ids(engine.apply(all, { startDate: '2025-02-01', endDate: '2025-07-31' }))).toEqual(['P1', 'P2']);
    expect(ids(engine.apply(all, { endDate: '2025-03-20' }))).toEqual(['P1', 'P3']);
  });

  it('sorts by opening date', () => {
    expect(ids(engine.apply(all, { sortBy: 'DATE' }))).toEqual(['P3', 'P1', 'P2']);
  });

  it('sorts by price of the chosen flat type with missing prices last', () => {
    expect(ids(engine.apply(all, { sortBy: 'PRICE' }))).toEqual(['P3', 'P1', 'P2']);
    expect(ids(engine.apply(all, { sortBy: 'PRICE', flatType: 'THREE_ROOM' }))).toEqual(['P1', 'P2']);
  });

  it('never reorders the input list', () => {
    const input = [maple, acacia, cedar];
    engine.apply(input, { sortBy: 'NAME' });
    expect(ids(input)).toEqual(['P2', 'P1', 'P3']);
  });
});
