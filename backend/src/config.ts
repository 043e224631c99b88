import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_DDL_PATH = path.resolve(currentDir, '../db/ddl.sql');
export const DEFAULT_SEED = 42;

export const REQUIRED_DATABASE_VARIABLES = ['DB_HOST', 'DB_NAME', 'DB_USER', 'DB_PASSWORD'] as const;

export type DatabaseConfig = {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
};

export type ServiceSettings = {
  port: number;
  scratchDir: string;
  ddlPath: string;
  seed: number;
};

const databaseEnvSchema = z.object({
  DB_HOST: z.string().min(1),
  DB_NAME: z.string().min(1),
  DB_USER: z.string().min(1),
  DB_PASSWORD: z.string().min(1),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_SSL: z
    .string()
    .optional()
    .transform((value) => value === 'true'),
});

const serviceEnvSchema = z.object({
  API_PORT: z.coerce.number().int().positive().default(8080),
  SCRATCH_DIR: z.string().min(1).optional(),
  DDL_PATH: z.string().min(1).optional(),
  GENERATOR_SEED: z.coerce.number().int().default(DEFAULT_SEED),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Reads the connection parameters. Throws before anything tries to connect when one
 * of the four required variables is absent or empty.
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const missing = REQUIRED_DATABASE_VARIABLES.filter((name) => !env[name]);
  if (missing.length) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const parsed = databaseEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid database configuration: ${describeIssues(parsed.error)}`);
  }

  return {
    host: parsed.data.DB_HOST,
    port: parsed.data.DB_PORT,
    database: parsed.data.DB_NAME,
    user: parsed.data.DB_USER,
    password: parsed.data.DB_PASSWORD,
    ssl: parsed.data.DB_SSL,
  };
}

export function loadServiceSettings(env: NodeJS.ProcessEnv = process.env): ServiceSettings {
  const parsed = serviceEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid service configuration: ${describeIssues(parsed.error)}`);
  }

  return {
    port: parsed.data.API_PORT,
    scratchDir: path.resolve(parsed.data.SCRATCH_DIR ?? os.tmpdir()),
    ddlPath: path.resolve(parsed.data.DDL_PATH ?? DEFAULT_DDL_PATH),
    seed: parsed.data.GENERATOR_SEED,
  };
}
