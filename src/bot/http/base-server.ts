import express from 'express';

export function createBaseApp() {
  const app = express();

  // Liveness probes only; no business routes live here
  const ok = (_: express.Request, res: express.Response) => {
    res.type('text/plain').send('OK');
  };
  app.get('/', ok);
  app.get('/health', ok);
  return app;
}
