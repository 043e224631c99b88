/**
 * Action Dispatcher Tests
 *
 * Drives the Express app through supertest. Most cases stub the loader operations;
 * the last block wires the real loader to a FakeDatabase.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createApp } from '../src/app.js';
import { DEFAULT_DDL_PATH } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import {
  INVALID_ACTION_MESSAGE,
  LOAD_SUCCESS_MESSAGE,
  SETUP_SUCCESS_MESSAGE,
} from '../src/routes/actions.js';
import { DEFAULT_PLAN, generateAll } from '../src/services/generator.js';
import {
  createLoaderOperations,
  type LoadSummary,
  type LoaderOperations,
  type OperationResult,
} from '../src/services/loader.js';
import { FakeDatabase, testDatabase } from './support/fake-db.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const loaded: LoadSummary = {
  rows: { hospitals: 1, departments: 20, providers: 50, patients: 5000, encounters: 10000, transactions: 10000 },
  files: ['hospitals.csv'],
};

function stubOperations() {
  return {
    setupDatabase: vi.fn(async (): Promise<OperationResult> => ({ ok: true, value: undefined })),
    truncateTables: vi.fn(async (): Promise<OperationResult> => ({ ok: true, value: undefined })),
    loadData: vi.fn(async (): Promise<OperationResult<LoadSummary>> => ({ ok: true, value: loaded })),
    checkDatabase: vi.fn(async (): Promise<OperationResult<string>> => ({ ok: true, value: '2026-10-18T08:00:00.000Z' })),
  } satisfies LoaderOperations;
}

let operations: ReturnType<typeof stubOperations>;

beforeEach(() => {
  operations = stubOperations();
});

function app() {
  return createApp({ operations, logRequests: false });
}

// ---------------------------------------------------------------------------
// Action parsing
// ---------------------------------------------------------------------------

describe('action parsing', () => {
  it('rejects a missing action without touching the loader', async () => {
    const res = await request(app()).get('/');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 'error', message: INVALID_ACTION_MESSAGE });
    expect(operations.setupDatabase).not.toHaveBeenCalled();
    expect(operations.loadData).not.toHaveBeenCalled();
  });

  it('rejects an unknown action', async () => {
    const res = await request(app()).post('/').send({ action: 'foo' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 'error', message: INVALID_ACTION_MESSAGE });
  });

  it('reads the action from the query string', async () => {
    const res = await request(app()).get('/').query({ action: 'setup_db' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', message: SETUP_SUCCESS_MESSAGE });
    expect(operations.setupDatabase).toHaveBeenCalledTimes(1);
  });

  it('reads the action from the JSON body', async () => {
    const res = await request(app()).post('/').send({ action: 'load_data' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', message: LOAD_SUCCESS_MESSAGE });
    expect(operations.loadData).toHaveBeenCalledTimes(1);
  });

  it('prefers the query string over the body', async () => {
    const res = await request(app()).post('/?action=setup_db').send({ action: 'load_data' });

    expect(res.status).toBe(200);
    expect(operations.setupDatabase).toHaveBeenCalledTimes(1);
    expect(operations.loadData).not.toHaveBeenCalled();
  });

  it('accepts any method', async () => {
    const res = await request(app()).put('/?action=setup_db');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', message: SETUP_SUCCESS_MESSAGE });
  });

  it('takes the first value of a repeated query key', async () => {
    const res = await request(app()).get('/?action=setup_db&action=load_data');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', message: SETUP_SUCCESS_MESSAGE });
    expect(operations.setupDatabase).toHaveBeenCalledTimes(1);
    expect(operations.loadData).not.toHaveBeenCalled();
  });

  it('treats a malformed JSON body as a missing action', async () => {
    const res = await request(app()).post('/').set('Content-Type', 'application/json').send('{"action":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 'error', message: INVALID_ACTION_MESSAGE });
  });

  it('treats a bare JSON string body as a missing action', async () => {
    const res = await request(app()).post('/').set('Content-Type', 'application/json').send('"setup_db"');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 'error', message: INVALID_ACTION_MESSAGE });
    expect(operations.setupDatabase).not.toHaveBeenCalled();
  });

  it('still runs a query-string action when the body does not parse', async () => {
    const res = await request(app())
      .post('/?action=setup_db')
      .set('Content-Type', 'application/json')
      .send('{"action":');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', message: SETUP_SUCCESS_MESSAGE });
    expect(operations.setupDatabase).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Action results
// ---------------------------------------------------------------------------

describe('action results', () => {
  it('maps a failed setup to a 500', async () => {
    operations.setupDatabase.mockResolvedValueOnce({ ok: false, message: 'Database setup failed: boom' });

    const res = await request(app()).post('/').send({ action: 'setup_db' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Database setup failed: boom' });
  });

  it('maps a failed load to a 500', async () => {
    operations.loadData.mockResolvedValueOnce({ ok: false, message: 'Data loading failed: disk full' });

    const res = await request(app()).post('/').send({ action: 'load_data' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Data loading failed: disk full' });
  });

  it('runs setup then load for setup_and_load', async () => {
    const res = await request(app()).post('/').send({ action: 'setup_and_load' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', message: LOAD_SUCCESS_MESSAGE });
    expect(operations.setupDatabase).toHaveBeenCalledTimes(1);
    expect(operations.loadData).toHaveBeenCalledTimes(1);
  });

  it('skips the load when setup fails', async () => {
    operations.setupDatabase.mockResolvedValueOnce({ ok: false, message: 'Database setup failed: boom' });

    const res = await request(app()).post('/').send({ action: 'setup_and_load' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Database setup failed: boom' });
    expect(operations.loadData).not.toHaveBeenCalled();
  });

  it('surfaces a configuration error as a 500', async () => {
    operations.setupDatabase.mockRejectedValueOnce(
      new ConfigurationError('Missing required environment variables: DB_PASSWORD')
    );
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await request(app()).post('/').send({ action: 'setup_db' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Missing required environment variables: DB_PASSWORD' });
    consoleError.mockRestore();
  });
});

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe('GET /health', () => {
  it('reports the database time', async () => {
    const res = await request(app()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', time: '2026-10-18T08:00:00.000Z' });
  });

  it('returns 503 when the database is unreachable', async () => {
    operations.checkDatabase.mockResolvedValueOnce({ ok: false, message: 'Database check failed: timeout' });

    const res = await request(app()).get('/health');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ status: 'error', message: 'Database check failed: timeout' });
  });
});

// ---------------------------------------------------------------------------
// Real loader, fake database
// ---------------------------------------------------------------------------

describe('dispatch through the loader', () => {
  let db: FakeDatabase;
  let scratchRoot: string;

  beforeEach(async () => {
    db = new FakeDatabase();
    scratchRoot = await fsp.mkdtemp(path.join(os.tmpdir(), 'actions-test-'));
  });

  afterEach(async () => {
    await fsp.rm(scratchRoot, { recursive: true, force: true });
  });

  function loaderApp(ddlPath: string, generate = vi.fn(generateAll)) {
    const loaderOperations = createLoaderOperations({
      resolveDatabase: () => testDatabase,
      connect: db.connect,
      generate,
      ddlPath,
      scratchRoot,
      plan: { ...DEFAULT_PLAN, providers: 3, patients: 4, encounters: 5, transactions: 5 },
      seed: 3,
    });
    return createApp({ operations: loaderOperations, logRequests: false });
  }

  it('opens no connection for an invalid action', async () => {
    const res = await request(loaderApp(DEFAULT_DDL_PATH)).get('/?action=drop_everything');

    expect(res.status).toBe(400);
    expect(db.connections).toBe(0);
  });

  it('never loads after a malformed schema file', async () => {
    const ddlPath = path.join(scratchRoot, 'broken.sql');
    await fsp.writeFile(ddlPath, 'create tabel hospitals (;\n\\echo done\n', 'utf8');
    db.failWhen = (text) => text.startsWith('create tabel');
    const generate = vi.fn(generateAll);

    const res = await request(loaderApp(ddlPath, generate)).post('/').send({ action: 'setup_and_load' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      status: 'error',
      message: 'Database setup failed: syntax error near "create tabel hospita"',
    });
    expect(generate).not.toHaveBeenCalled();
    expect(db.connections).toBe(1);
  });

  it('sets up and loads end to end', async () => {
    const res = await request(loaderApp(DEFAULT_DDL_PATH)).post('/').send({ action: 'setup_and_load' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', message: LOAD_SUCCESS_MESSAGE });
    expect(db.copies).toHaveLength(6);
    expect(db.connections).toBe(3);
  });
});
