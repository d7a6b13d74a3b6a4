import { z } from 'zod';
import type { FlatType } from '../../core/domain/entities/Project';
import type { ApplicationStatus, MaritalStatus } from '../../core/domain/entities/User';
import type { ApprovedStatus, RequestType } from '../../core/domain/entities/Request';
import type { SortKey } from '../../core/application/services';
import { isIsoDate } from '../../core/domain/rules/dates';

// Accepts TWO_ROOM, two_room, 2-room or just 2
const FlatTypeInput = z
  .string()
  .transform((raw) => raw.trim().toUpperCase().replace(/[-\s]/g, '_'))
  .pipe(
    z.union([
      z.enum(['TWO_ROOM', 'THREE_ROOM']),
      z.literal('2').transform((): FlatType => 'TWO_ROOM'),
      z.literal('2_ROOM').transform((): FlatType => 'TWO_ROOM'),
      z.literal('3').transform((): FlatType => 'THREE_ROOM'),
      z.literal('3_ROOM').transform((): FlatType => 'THREE_ROOM'),
    ]),
  );

// CLI words for manager decisions
const DecisionInput = z.enum(['approve', 'reject', 'pending']).transform(
  (word): ApprovedStatus => (word === 'approve' ? 'SUCCESSFUL' : word === 'reject' ? 'UNSUCCESSFUL' : 'PENDING'),
);

const upper = z.string().transform((raw) => raw.trim().toUpperCase());

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: string, label: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ${label}: "${raw}"`);
  }
  return parsed.data;
}

export const parseFlatType = (raw: string): FlatType => parseWith(FlatTypeInput, raw, 'flat type');

export const parseDecision = (raw: string): ApprovedStatus => parseWith(DecisionInput, raw.toLowerCase(), 'decision');

export const parseSortKey = (raw: string): SortKey =>
  parseWith(upper.pipe(z.enum(['NAME', 'PRICE', 'DATE'])), raw, 'sort key');

export const parseMaritalStatus = (raw: string): MaritalStatus =>
  parseWith(upper.pipe(z.enum(['SINGLE', 'MARRIED'])), raw, 'marital status');

export const parseApplicationStatus = (raw: string): ApplicationStatus =>
  parseWith(upper.pipe(z.enum(['PENDING', 'SUCCESSFUL', 'UNSUCCESSFUL', 'BOOKED', 'WITHDRAWN'])), raw, 'status');

export const parseRequestType = (raw: string): RequestType =>
  parseWith(upper.pipe(z.enum(['BTO_APPLICATION', 'BTO_WITHDRAWAL', 'REGISTRATION', 'ENQUIRY'])), raw, 'request type');

export const parseDate = (raw: string): string =>
  parseWith(z.string().trim().refine(isIsoDate), raw, 'date (expected YYYY-MM-DD)');

export const parseCount = (raw: string): number => parseWith(z.coerce.number().int().nonnegative(), raw, 'count');

export const parseAmount = (raw: string): number => parseWith(z.coerce.number().nonnegative(), raw, 'amount');

// Comma-separated list, blanks dropped
export const parseList = (raw: string): string[] =>
  raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
