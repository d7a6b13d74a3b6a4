import type { IsoDate } from '../entities/Project';

export interface DateWindow {
  openDate: IsoDate;
  closeDate: IsoDate;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const isIsoDate = (value: string): value is IsoDate => {
  if (!ISO_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

// Closed intervals: sharing a single boundary day counts as overlap
export const windowsOverlap = (existing: DateWindow, candidate: DateWindow): boolean =>
  !(existing.closeDate < candidate.openDate || candidate.closeDate < existing.openDate);

// Strict: applications are closed on the open and close days themselves
export const isStrictlyWithin = (today: IsoDate, window: DateWindow): boolean =>
  window.openDate < today && today < window.closeDate;

export const todayIso = (now: Date = new Date()): IsoDate => now.toISOString().slice(0, 10);
