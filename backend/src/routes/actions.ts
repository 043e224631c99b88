import { Router, type Request } from 'express';
import { z } from 'zod';
import { badRequest } from '../errors.js';
import { createLoaderOperations, type LoaderOperations, type OperationResult } from '../services/loader.js';
import { asyncHandler } from '../utils/async-handler.js';

export const ACTIONS = ['setup_db', 'load_data', 'setup_and_load'] as const;
export type Action = (typeof ACTIONS)[number];

export const INVALID_ACTION_MESSAGE =
  "Invalid or missing action. Use 'setup_db', 'load_data', or 'setup_and_load'.";
export const SETUP_SUCCESS_MESSAGE = 'Database setup completed successfully.';
export const LOAD_SUCCESS_MESSAGE = 'Data loading completed successfully.';

export type ActionResponse = {
  status: 'success' | 'error';
  message: string;
};

const actionSchema = z.enum(ACTIONS);
const bodySchema = z.object({ action: z.unknown() }).partial();

/** Query string wins over the JSON body, as long as it carries the key at all. A repeated key takes its first value. */
function readAction(req: Request): unknown {
  if ('action' in req.query) {
    const action = req.query.action;
    return Array.isArray(action) ? action[0] : action;
  }
  const body = bodySchema.safeParse(req.body);
  return body.success ? body.data.action : undefined;
}

function toResponse(result: OperationResult<unknown>, successMessage: string): [number, ActionResponse] {
  if (result.ok) {
    return [200, { status: 'success', message: successMessage }];
  }
  return [500, { status: 'error', message: result.message }];
}

async function runAction(action: Action, operations: LoaderOperations): Promise<[number, ActionResponse]> {
  switch (action) {
    case 'setup_db':
      return toResponse(await operations.setupDatabase(), SETUP_SUCCESS_MESSAGE);
    case 'load_data':
      return toResponse(await operations.loadData(), LOAD_SUCCESS_MESSAGE);
    case 'setup_and_load': {
      const setup = await operations.setupDatabase();
      if (!setup.ok) {
        return toResponse(setup, SETUP_SUCCESS_MESSAGE);
      }
      return toResponse(await operations.loadData(), LOAD_SUCCESS_MESSAGE);
    }
  }
}

export function createActionsRouter(operations: LoaderOperations = createLoaderOperations()): Router {
  const router = Router();

  router.all(
    '/',
    asyncHandler<ActionResponse>(async (req, res) => {
      const parsed = actionSchema.safeParse(readAction(req));
      if (!parsed.success) {
        throw badRequest(INVALID_ACTION_MESSAGE);
      }

      const [statusCode, body] = await runAction(parsed.data, operations);
      res.status(statusCode).json(body);
    })
  );

  return router;
}
