import dotenv from 'dotenv';
import { z } from 'zod';
import { AllocationError } from '../core/domain/outcome';

dotenv.config();

// Paths are resolved against the working directory; LOG_LEVEL overrides the per-environment default
const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATA_DIR: z.string().min(1).default('data'),
  POLICY_PATH: z.string().min(1).default('config/policy.json'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

// Parse and validate a raw environment, raising AllocationError on bad values
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new AllocationError(`Invalid environment: ${issues}`, 'INVALID_ENV', { cause: result.error });
  }
  return result.data;
}

export const env = parseEnv(process.env);
