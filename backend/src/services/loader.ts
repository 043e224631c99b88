import { createReadStream, promises as fsp } from 'node:fs';
import path from 'node:path';
import { loadDatabaseConfig, loadServiceSettings, type DatabaseConfig } from '../config.js';
import { openSession, withTransaction, type Connect } from '../db.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { DROP_ORDER, LOAD_ORDER, copyStatement, isTableFile, type TableName } from '../schema.js';
import {
  DEFAULT_PLAN,
  generateAll,
  type GenerateOptions,
  type GenerationPlan,
  type GenerationSummary,
} from './generator.js';

const logger = createLogger('loader');

export type OperationResult<T = undefined> = { ok: true; value: T } | { ok: false; message: string };

export type LoadSummary = {
  rows: Record<TableName, number>;
  files: string[];
};

export type LoadOptions = {
  truncate?: boolean;
};

export type LoaderContext = {
  /** Throws `ConfigurationError`; called before any connection is attempted. */
  resolveDatabase: () => DatabaseConfig;
  connect: Connect;
  generate: (plan: GenerationPlan, options: GenerateOptions) => Promise<GenerationSummary>;
  ddlPath: string;
  scratchRoot: string;
  plan: GenerationPlan;
  seed?: number;
};

export type LoaderOperations = {
  setupDatabase: () => Promise<OperationResult>;
  truncateTables: () => Promise<OperationResult>;
  loadData: (options?: LoadOptions) => Promise<OperationResult<LoadSummary>>;
  checkDatabase: () => Promise<OperationResult<string>>;
};

const SCRATCH_PREFIX = 'hospital-data-';

function success(): OperationResult;
function success<T>(value: T): OperationResult<T>;
function success<T>(value?: T): OperationResult<T | undefined> {
  return { ok: true, value };
}

function failure(message: string): { ok: false; message: string } {
  return { ok: false, message };
}

export function createLoaderContext(env: NodeJS.ProcessEnv = process.env): LoaderContext {
  const settings = loadServiceSettings(env);
  return {
    resolveDatabase: () => loadDatabaseConfig(env),
    connect: openSession,
    generate: generateAll,
    ddlPath: settings.ddlPath,
    scratchRoot: settings.scratchDir,
    plan: DEFAULT_PLAN,
    seed: settings.seed,
  };
}

/** Removes psql meta-commands (`\echo`, `\connect`, ...), which the server cannot execute. */
export function stripMetaCommands(script: string): string {
  return script
    .split(/\r?\n/)
    .filter((line) => !line.trim().startsWith('\\'))
    .join('\n');
}

export async function setupDatabase(context: LoaderContext = createLoaderContext()): Promise<OperationResult> {
  logger.info('Starting database setup...');
  const database = context.resolveDatabase();
  try {
    await withTransaction(
      () => context.connect(database),
      async (session) => {
        logger.info('Dropping existing tables...');
        for (const table of DROP_ORDER) {
          await session.query(`drop table if exists ${table} cascade`);
        }
        const script = await fsp.readFile(context.ddlPath, 'utf8');
        await session.query(stripMetaCommands(script));
      }
    );
    logger.info('Database setup completed successfully.');
    return success();
  } catch (error) {
    const message = `Database setup failed: ${errorMessage(error)}`;
    logger.error(message);
    return failure(message);
  }
}

export async function truncateTables(context: LoaderContext = createLoaderContext()): Promise<OperationResult> {
  logger.info('Truncating tables...');
  const database = context.resolveDatabase();
  try {
    await withTransaction(
      () => context.connect(database),
      async (session) => {
        for (const table of DROP_ORDER) {
          await session.query(`truncate table ${table} cascade`);
        }
      }
    );
    logger.info('Tables truncated successfully.');
    return success();
  } catch (error) {
    const message = `Truncate failed: ${errorMessage(error)}`;
    logger.error(message);
    return failure(message);
  }
}

async function removeScratchDirectory(dir: string): Promise<void> {
  try {
    const entries = await fsp.readdir(dir);
    for (const entry of entries) {
      if (entry.endsWith('.csv')) {
        await fsp.rm(path.join(dir, entry), { force: true });
      }
    }
    await fsp.rmdir(dir);
  } catch (error) {
    logger.warn(`Could not clean up ${dir}: ${errorMessage(error)}`);
  }
}

export async function loadData(
  options: LoadOptions = {},
  context: LoaderContext = createLoaderContext()
): Promise<OperationResult<LoadSummary>> {
  const { truncate = true } = options;
  const database = context.resolveDatabase();

  if (truncate) {
    const truncated = await truncateTables(context);
    if (!truncated.ok) {
      return truncated;
    }
  }

  logger.info('Starting data generation and loading...');
  let scratchDir: string | null = null;

  try {
    await fsp.mkdir(context.scratchRoot, { recursive: true });
    scratchDir = await fsp.mkdtemp(path.join(context.scratchRoot, SCRATCH_PREFIX));
    const outputDir = scratchDir;

    logger.info(`Generating data in ${outputDir}...`);
    await context.generate(context.plan, { outputDir, seed: context.seed });
    const available = (await fsp.readdir(outputDir)).filter((name) => name.endsWith('.csv')).sort();

    logger.info('Loading data into the database...');
    const summary = await withTransaction(
      () => context.connect(database),
      async (session) => {
        const rows: Record<TableName, number> = {
          hospitals: 0,
          departments: 0,
          providers: 0,
          patients: 0,
          encounters: 0,
          transactions: 0,
        };
        const files: string[] = [];

        for (const table of LOAD_ORDER) {
          const tableFiles = available.filter((name) => isTableFile(table, name));
          if (!tableFiles.length) {
            logger.warn(`No CSV file found for table ${table}; skipping.`);
            continue;
          }
          for (const fileName of tableFiles) {
            logger.info(`Loading ${table} from ${fileName}...`);
            const copied = await session.copyFrom(
              copyStatement(table),
              createReadStream(path.join(outputDir, fileName))
            );
            rows[table] += copied;
            files.push(fileName);
          }
        }

        return { rows, files };
      }
    );

    logger.info('Data loading completed successfully.');
    return success(summary);
  } catch (error) {
    const message = `Data loading failed: ${errorMessage(error)}`;
    logger.error(message);
    return failure(message);
  } finally {
    if (scratchDir) {
      await removeScratchDirectory(scratchDir);
    }
  }
}

export async function checkDatabase(context: LoaderContext = createLoaderContext()): Promise<OperationResult<string>> {
  const database = context.resolveDatabase();
  try {
    const { rows } = await withTransaction(
      () => context.connect(database),
      (session) => session.query('select now() as now')
    );
    const now = rows[0]?.now;
    return success(now instanceof Date ? now.toISOString() : String(now));
  } catch (error) {
    const message = `Database check failed: ${errorMessage(error)}`;
    logger.error(message);
    return failure(message);
  }
}

export function createLoaderOperations(context: LoaderContext = createLoaderContext()): LoaderOperations {
  return {
    setupDatabase: () => setupDatabase(context),
    truncateTables: () => truncateTables(context),
    loadData: (options) => loadData(options, context),
    checkDatabase: () => checkDatabase(context),
  };
}
