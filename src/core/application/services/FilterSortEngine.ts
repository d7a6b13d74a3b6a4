import type { FlatType, IsoDate, Project } from '../../domain/entities/Project';
import { FLAT_TYPES } from '../../domain/entities/Project';

export type SortKey = 'NAME' | 'PRICE' | 'DATE';

export const SORT_KEYS: readonly SortKey[] = ['NAME', 'PRICE', 'DATE'];

export interface FilterCriteria {
  locations?: string[];
  minPrice?: number;
  maxPrice?: number;
  flatType?: FlatType;
  startDate?: IsoDate;
  endDate?: IsoDate;
  sortBy?: SortKey;
}

type Predicate = (project: Project, criteria: FilterCriteria) => boolean;

const unitsOf = (project: Project, type: FlatType): number => project.units.get(type) ?? 0;

// Price bounds apply to every flat type whichever one is chosen; a missing price is out of bounds
const pricesWithin = (project: Project, inBounds: (price: number) => boolean): boolean =>
  FLAT_TYPES.every((type) => {
    const price = project.price.get(type);
    return price !== undefined && inBounds(price);
  });

const predicates: Predicate[] = [
  (p, c) => (c.flatType ? unitsOf(p, c.flatType) > 0 : FLAT_TYPES.some((type) => unitsOf(p, type) > 0)),
  (p, c) => !c.locations?.length || c.locations.some((loc) => p.neighborhoods.has(loc)),
  (p, c) => c.minPrice === undefined || pricesWithin(p, (price) => price >= (c.minPrice ?? 0)),
  (p, c) => c.maxPrice === undefined || pricesWithin(p, (price) => price <= (c.maxPrice ?? Infinity)),
  (p, c) => c.startDate === undefined || p.openDate >= c.startDate,
  (p, c) => c.endDate === undefined || p.closeDate <= c.endDate,
];

const comparators: Record<SortKey, (criteria: FilterCriteria) => (a: Project, b: Project) => number> = {
  NAME: () => (a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
  DATE: () => (a, b) => (a.openDate < b.openDate ? -1 : a.openDate > b.openDate ? 1 : 0),
  PRICE: (criteria) => {
    const key = criteria.flatType ?? 'TWO_ROOM';
    // Projects without a price for the key sort last
    const priceOf = (p: Project) => p.price.get(key) ?? Number.POSITIVE_INFINITY;
    return (a, b) => {
      const diff = priceOf(a) - priceOf(b);
      return Number.isNaN(diff) ? 0 : diff;
    };
  },
};

export class FilterSortEngine {
  apply(projects: readonly Project[], criteria: FilterCriteria = {}): Project[] {
    const matching = projects.filter((project) => predicates.every((keep) => keep(project, criteria)));
    return matching.sort(comparators[criteria.sortBy ?? 'NAME'](criteria));
  }
}
