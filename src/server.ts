import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import { UPDATE_PATH } from './constants.js';
import { handleUpdate, type UpdateDeps } from './update.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create the HTTP application serving the update endpoint.
 *
 * `GET` reads parameters from the query string; `POST` additionally accepts
 * a form-encoded body, whose values take precedence.
 */
export function createApp(deps: UpdateDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.urlencoded({ extended: false }));

  function update(req: Request, res: Response, next: NextFunction): void {
    const params: Record<string, unknown> = {
      ...req.query,
      ...(isRecord(req.body) ? req.body : {}),
    };

    handleUpdate(params, deps)
      .then((result) => {
        res.status(result.status).type('text/plain').send(result.body);
      })
      .catch(next);
  }

  app.get(UPDATE_PATH, update);
  app.post(UPDATE_PATH, update);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    deps.logger.error(
      `Unhandled error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`
    );
    res.status(500).type('text/plain').send('Internal server error.');
  });

  return app;
}
