import express, { type Express } from 'express';
import { createServer, type Server } from 'http';
import { buildReplayIndex } from '../replay/index-builder.js';
import { TraceReader } from '../tracer/store.js';
import { logger } from '../utils/logger.js';
import { createReplayRouter } from './routes/replay.js';
import { createSessionsRouter } from './routes/sessions.js';

export interface ServerOptions {
  port: number;
  traceFile: string;
}

/**
 * Build the inspection API over a trace file. The replay index is built once,
 * from the sessions present when the app is created.
 */
export function createApp(reader: TraceReader): Express {
  const index = buildReplayIndex(reader.readAll());

  const app = express();
  app.use(express.json());

  app.use('/api/sessions', createSessionsRouter(reader));
  app.use('/api', createReplayRouter(index));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, trace: reader.path, entries: index.size });
  });

  return app;
}

export function startServer(options: ServerOptions): Promise<Server> {
  const { port, traceFile } = options;
  const app = createApp(new TraceReader(traceFile));
  const server = createServer(app);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      logger.info(`Server listening on http://localhost:${port}`, { trace: traceFile });
      console.error(`\nmcp-tape server running at http://localhost:${port}`);
      console.error(`API: http://localhost:${port}/api/sessions\n`);
      resolve(server);
    });
  });
}
