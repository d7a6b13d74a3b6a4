import Papa from 'papaparse';
import { z } from 'zod';
import type { EntityKind, EntityKinds } from '../../core/ports';
import { FLAT_TYPES } from '../../core/domain/entities/Project';
import { AllocationError } from '../../core/domain/outcome';
import { isIsoDate } from '../../core/domain/rules/dates';

export type CsvRow = Record<string, string>;

export interface RowCodec<T> {
  columns: readonly string[];
  decode(row: CsvRow, where: string): T;
  encode(item: T): string[];
}

// ==================== Field schemas ====================

const LIST_SEPARATOR = ';';
const PAIR_SEPARATOR = '=';

const splitList = (raw: string): string[] =>
  raw
    .split(LIST_SEPARATOR)
    .map((entry) => entry.trim())
    .filter(Boolean);

const id = z.string().trim().min(1);
const isoDate = z.string().trim().refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' });
const count = z.coerce.number().int().nonnegative();
const flatType = z.enum(['TWO_ROOM', 'THREE_ROOM']);
const approval = z.enum(['PENDING', 'SUCCESSFUL', 'UNSUCCESSFUL']);
const applicationStatus = z.enum(['PENDING', 'SUCCESSFUL', 'UNSUCCESSFUL', 'BOOKED', 'WITHDRAWN']);
const registrationStatus = z.enum(['PENDING', 'APPROVED', 'APPROVED_UNASSIGNED', 'REJECTED']);

// Empty cell means null
const nullableText = z
  .string()
  .default('')
  .transform((raw) => (raw.trim() === '' ? null : raw));

const idSet = z
  .string()
  .default('')
  .transform((raw) => new Set(splitList(raw)));

// "KEY=VALUE;KEY=VALUE" into a Map, validating both sides
function pairs<K extends z.ZodTypeAny, V extends z.ZodTypeAny>(key: K, value: V) {
  return z
    .string()
    .default('')
    .transform((raw, ctx) => {
      const map = new Map<z.output<K>, z.output<V>>();
      for (const entry of splitList(raw)) {
        const [rawKey, rawValue] = entry.split(PAIR_SEPARATOR);
        const parsedKey = key.safeParse(rawKey?.trim());
        const parsedValue = value.safeParse(rawValue?.trim());
        if (rawValue === undefined || !parsedKey.success || !parsedValue.success) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bad entry "${entry}"` });
          return z.NEVER;
        }
        map.set(parsedKey.data, parsedValue.data);
      }
      return map;
    });
}

const joinList = (values: Iterable<string>): string => [...values].join(LIST_SEPARATOR);

const joinPairs = (map: ReadonlyMap<string, string | number>): string =>
  [...map].map(([key, value]) => `${key}${PAIR_SEPARATOR}${value}`).join(LIST_SEPARATOR);

// ==================== Row schemas ====================

const ProjectRow = z.object({
  projectID: id,
  name: z.string().trim().min(1),
  neighborhoods: idSet,
  units: pairs(flatType, count),
  price: pairs(flatType, z.coerce.number().nonnegative()),
  openDate: isoDate,
  closeDate: isoDate,
  managerID: id,
  officerSlotsRemaining: count,
  assignedOfficerIDs: idSet,
  bookedApplicantIDs: idSet,
  visible: z.enum(['true', 'false']).transform((flag) => flag === 'true'),
});

const ApplicantRow = z.object({
  userID: id,
  name: z.string().trim().min(1),
  age: count,
  maritalStatus: z.enum(['SINGLE', 'MARRIED']),
  activeProjectID: nullableText,
  applicationStatusByProject: pairs(id, applicationStatus),
  appliedFlatByProject: pairs(id, flatType),
});

// Officers without an explicit profile id apply under their own user id
const OfficerRow = z
  .object({
    userID: id,
    applicantID: z.string().trim().default(''),
    registeredProjectIDs: idSet,
    registrationStatusByProject: pairs(id, registrationStatus),
  })
  .transform((row) => ({ ...row, applicantID: row.applicantID || row.userID }));

const ManagerRow = z.object({
  userID: id,
  name: z.string().trim().min(1),
  projectIDs: idSet,
});

const requestBase = {
  requestID: id,
  userID: id,
  projectID: id,
  overallStatus: z.enum(['PENDING', 'DONE']),
};

const RequestRow = z.discriminatedUnion('type', [
  z.object({ ...requestBase, type: z.literal('BTO_APPLICATION'), approval, flatType }),
  z.object({
    ...requestBase,
    type: z.literal('BTO_WITHDRAWAL'),
    approval,
    priorStatus: applicationStatus,
    flatType: z
      .union([flatType, z.literal('')])
      .default('')
      .transform((value) => (value === '' ? null : value)),
  }),
  z.object({ ...requestBase, type: z.literal('REGISTRATION'), approval }),
  z.object({
    ...requestBase,
    type: z.literal('ENQUIRY'),
    query: z.string().trim().min(1),
    answer: nullableText,
    answeredBy: nullableText,
  }),
]);

// ==================== Codecs ====================

function decoder<S extends z.ZodTypeAny>(kind: EntityKind, schema: S) {
  return (row: CsvRow, where: string): z.output<S> => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`)
        .join('; ');
      throw new AllocationError(`Malformed ${kind} row at ${where}: ${issues}`, 'MALFORMED_ROW', {
        cause: parsed.error,
      });
    }
    return parsed.data;
  };
}

const projectCodec: RowCodec<EntityKinds['projects']> = {
  columns: [
    'projectID',
    'name',
    'neighborhoods',
    'units',
    'price',
    'openDate',
    'closeDate',
    'managerID',
    'officerSlotsRemaining',
    'assignedOfficerIDs',
    'bookedApplicantIDs',
    'visible',
  ],
  decode: decoder('projects', ProjectRow),
  encode: (p) => [
    p.projectID,
    p.name,
    joinList(p.neighborhoods),
    joinPairs(orderedByFlat(p.units)),
    joinPairs(orderedByFlat(p.price)),
    p.openDate,
    p.closeDate,
    p.managerID,
    String(p.officerSlotsRemaining),
    joinList(p.assignedOfficerIDs),
    joinList(p.bookedApplicantIDs),
    String(p.visible),
  ],
};

const applicantCodec: RowCodec<EntityKinds['applicants']> = {
  columns: [
    'userID',
    'name',
    'age',
    'maritalStatus',
    'activeProjectID',
    'applicationStatusByProject',
    'appliedFlatByProject',
  ],
  decode: decoder('applicants', ApplicantRow),
  encode: (a) => [
    a.userID,
    a.name,
    String(a.age),
    a.maritalStatus,
    a.activeProjectID ?? '',
    joinPairs(a.applicationStatusByProject),
    joinPairs(a.appliedFlatByProject),
  ],
};

const officerCodec: RowCodec<EntityKinds['officers']> = {
  columns: ['userID', 'applicantID', 'registeredProjectIDs', 'registrationStatusByProject'],
  decode: decoder('officers', OfficerRow),
  encode: (o) => [o.userID, o.applicantID, joinList(o.registeredProjectIDs), joinPairs(o.registrationStatusByProject)],
};

const managerCodec: RowCodec<EntityKinds['managers']> = {
  columns: ['userID', 'name', 'projectIDs'],
  decode: decoder('managers', ManagerRow),
  encode: (m) => [m.userID, m.name, joinList(m.projectIDs)],
};

// All request types share one file; columns a type does not use stay empty
const requestCodec: RowCodec<EntityKinds['requests']> = {
  columns: [
    'requestID',
    'type',
    'userID',
    'projectID',
    'overallStatus',
    'approval',
    'flatType',
    'priorStatus',
    'query',
    'answer',
    'answeredBy',
  ],
  decode: decoder('requests', RequestRow),
  encode: (r) => {
    const base = [r.requestID, r.type, r.userID, r.projectID, r.overallStatus];
    switch (r.type) {
      case 'BTO_APPLICATION':
        return [...base, r.approval, r.flatType, '', '', '', ''];
      case 'BTO_WITHDRAWAL':
        return [...base, r.approval, r.flatType ?? '', r.priorStatus, '', '', ''];
      case 'REGISTRATION':
        return [...base, r.approval, '', '', '', '', ''];
      case 'ENQUIRY':
        return [...base, '', '', '', r.query, r.answer ?? '', r.answeredBy ?? ''];
    }
  },
};

export const codecs: { [K in EntityKind]: RowCodec<EntityKinds[K]> } = {
  projects: projectCodec,
  applicants: applicantCodec,
  officers: officerCodec,
  managers: managerCodec,
  requests: requestCodec,
};

function orderedByFlat<V>(map: ReadonlyMap<string, V>): Map<string, V> {
  const ordered = new Map<string, V>();
  for (const type of FLAT_TYPES) {
    const value = map.get(type);
    if (value !== undefined) ordered.set(type, value);
  }
  return ordered;
}

// ==================== Files ====================

export function parseRows(text: string, source: string): CsvRow[] {
  const result = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });
  if (result.errors.length) {
    const details = result.errors.map((e) => `row ${e.row ?? '?'}: ${e.message}`).join('; ');
    throw new AllocationError(`Cannot parse ${source}: ${details}`, 'MALFORMED_CSV');
  }
  return result.data;
}

export function decodeAll<K extends EntityKind>(kind: K, text: string, source: string): EntityKinds[K][] {
  const codec: RowCodec<EntityKinds[K]> = codecs[kind];
  // Header is line 1, so data row i sits on line i + 2
  return parseRows(text, source).map((row, index) => codec.decode(row, `${source}:${index + 2}`));
}

export function encodeAll<K extends EntityKind>(kind: K, items: readonly EntityKinds[K][]): string {
  const codec: RowCodec<EntityKinds[K]> = codecs[kind];
  return Papa.unparse({ fields: [...codec.columns], data: items.map((item) => codec.encode(item)) }, { newline: '\n' });
}
