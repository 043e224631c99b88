import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { createActionsRouter } from './routes/actions.js';
import { createHealthRouter } from './routes/health.js';
import { errorHandler } from './middleware/error-handler.js';
import { lenientJson } from './middleware/lenient-json.js';
import { createLoaderOperations, type LoaderOperations } from './services/loader.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

export type AppOptions = {
  operations?: LoaderOperations;
  logRequests?: boolean;
};

export function createApp({ operations = createLoaderOperations(), logRequests = true }: AppOptions = {}): Express {
  const openApiDocument = z.record(z.unknown()).parse(YAML.parse(readFileSync(openApiPath, 'utf8')));

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(lenientJson);
  if (logRequests) {
    app.use(morgan('combined'));
  }

  app.use('/health', createHealthRouter(operations));
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });
  app.use('/', createActionsRouter(operations));

  app.use(errorHandler);

  return app;
}
