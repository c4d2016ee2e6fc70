import express, { Express } from 'express';
import { Server } from 'http';
import { createApiRouter, ApiDependencies, errorHandler, notFoundHandler } from './routes';

// Forwarded threads run long; body-parser's default is 100kb
export const JSON_BODY_LIMIT = '1mb';

export function createServer(dependencies: ApiDependencies): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use('/', createApiRouter(dependencies));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`AI Email Responder API running on http://localhost:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
