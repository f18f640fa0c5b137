import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { loadConfig } from './config';
import { createRequestHandler, type RequestHandler } from './handler';
import { createLogger } from './logger';
import { startDashboard } from './startup';

const log = createLogger('Server');

const toRequest = (req: IncomingMessage): Request =>
  new Request(new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`), {
    method: req.method ?? 'GET',
  });

const respond = async (handler: RequestHandler, req: IncomingMessage, res: ServerResponse): Promise<void> => {
  const response = await handler(toRequest(req));
  res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
  if (req.method === 'HEAD') {
    res.end();
    return;
  }
  res.end(Buffer.from(await response.arrayBuffer()));
};

const main = async (): Promise<void> => {
  const config = loadConfig();
  const context = await startDashboard(config);
  const handler = createRequestHandler(context, { clientDir: config.clientDir });

  const server = createServer((req, res) => {
    respond(handler, req, res).catch((error: unknown) => {
      log.error('Failed to write response', error);
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });

  server.on('error', (error) => {
    log.error(`Cannot listen on ${config.host}:${config.port}`, error);
    process.exit(1);
  });

  server.listen(config.port, config.host, () => {
    log.info(`US Tornado Dashboard listening on http://${config.host}:${config.port}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info(`${signal} received, closing server`);
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

main().catch((error: unknown) => {
  createLogger('Startup').error(error instanceof Error ? error.message : String(error), error);
  process.exit(1);
});
