import { Router } from 'express';
import { serviceUnavailable } from '../errors.js';
import type { LoaderOperations } from '../services/loader.js';
import { asyncHandler } from '../utils/async-handler.js';

export type HealthResponse = {
  status: 'ok';
  time: string;
};

export function createHealthRouter(operations: Pick<LoaderOperations, 'checkDatabase'>): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler<HealthResponse>(async (_req, res) => {
      const result = await operations.checkDatabase();
      if (!result.ok) {
        throw serviceUnavailable(result.message);
      }
      res.json({ status: 'ok', time: result.value });
    })
  );

  return router;
}
