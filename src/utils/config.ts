/**
 * Environment configuration
 *
 * Parsed once at startup with Zod. A bad or missing required variable stops
 * the process with a list of every problem found.
 */

import { z } from 'zod';

const rolePrivilegesSchema = z.record(z.string(), z.array(z.string().min(1)));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3001),
    CORS_ORIGIN: z.string().min(1, 'CORS_ORIGIN environment variable must be set'),
    JWT_SECRET: z.string().min(1, 'JWT_SECRET is not set in environment variables'),
    OBS_STORE: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().url().optional(),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    LOG_LEVEL: z.string().optional(),
    ROLE_PRIVILEGES: z
      .string()
      .optional()
      .transform((raw, ctx) => {
        if (!raw) return undefined;
        let parsed: unknown;
        try {
          parsed = JSON.parse(raw);
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `ROLE_PRIVILEGES is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
          });
          return z.NEVER;
        }
        const result = rolePrivilegesSchema.safeParse(parsed);
        if (!result.success) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'ROLE_PRIVILEGES must map role names to arrays of privilege names'
          });
          return z.NEVER;
        }
        return result.data;
      })
  })
  .superRefine((env, ctx) => {
    if (env.OBS_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when OBS_STORE=postgres'
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  corsOrigins: string[];
  jwtSecret: string;
  store: Env['OBS_STORE'];
  databaseUrl?: string;
  dbPoolMax: number;
  rolePrivileges?: Record<string, string[]>;
  isProduction: boolean;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    corsOrigins: parsed.CORS_ORIGIN.split(',').map((origin) => origin.trim()),
    jwtSecret: parsed.JWT_SECRET,
    store: parsed.OBS_STORE,
    databaseUrl: parsed.DATABASE_URL,
    dbPoolMax: parsed.DB_POOL_MAX,
    rolePrivileges: parsed.ROLE_PRIVILEGES,
    isProduction: parsed.NODE_ENV === 'production'
  };
};
