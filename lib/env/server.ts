import { z } from 'zod';

const serverEnvSchema = z.object({
  // App
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Planner
  PLANNER_SEED: z.string().min(1).optional(),
  PLANNER_WEEK_START: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected an ISO date (yyyy-MM-dd)')
    .optional(),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

export function parseServerEnv(source: Record<string, string | undefined>): ServerEnv {
  const parsed = serverEnvSchema.safeParse(source);

  if (!parsed.success) {
    console.error('❌ Invalid server environment variables:', parsed.error.flatten().fieldErrors);
    throw new Error('Invalid server environment variables');
  }

  return parsed.data;
}

export const serverEnv = parseServerEnv(process.env);
