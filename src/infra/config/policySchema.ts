import { z } from 'zod';

// Minimum ages per marital status; singles need to be older to qualify
const EligibilitySchema = z
  .object({
    marriedMinAge: z.number().int().nonnegative().default(21),
    singleMinAge: z.number().int().nonnegative().default(35),
  })
  .default({});

// Ids look like prefix + zero-padded counter, e.g. P0001
const IdFormatSchema = z
  .object({
    projectPrefix: z.string().min(1).default('P'),
    requestPrefix: z.string().min(1).default('R'),
    width: z.number().int().min(1).max(12).default(4),
  })
  .refine((ids) => ids.projectPrefix !== ids.requestPrefix, {
    message: 'project and request prefixes must differ',
  })
  .default({});

// One CSV file per entity kind, relative to DATA_DIR
const DataFilesSchema = z
  .object({
    projects: z.string().min(1).default('projects.csv'),
    applicants: z.string().min(1).default('applicants.csv'),
    officers: z.string().min(1).default('officers.csv'),
    managers: z.string().min(1).default('managers.csv'),
    requests: z.string().min(1).default('requests.csv'),
  })
  .default({});

// Complete policy configuration schema; every section may be omitted
export const PolicySchema = z.object({
  eligibility: EligibilitySchema,
  ids: IdFormatSchema,
  dataFiles: DataFilesSchema,
});

// z.infer<typeof Schema> extracts TypeScript type from Zod schema
export type PolicyConfig = z.infer<typeof PolicySchema>;
