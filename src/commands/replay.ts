import { loadConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { MockResponder } from '../replay/responder.js';
import { serveStdio } from '../replay/server.js';
import { TraceReader } from '../tracer/store.js';
import type { Session } from '../tracer/types.js';
import { logger, setLogLevel } from '../utils/logger.js';

interface ReplayOptions {
  trace?: string;
  session?: string;
  debug?: boolean;
}

export async function replayCommand(options: ReplayOptions): Promise<void> {
  const config = loadConfig();
  setLogLevel(options.debug ? 'debug' : config.logLevel);

  const reader = new TraceReader(options.trace ?? config.traceFile);
  let sessions: Session[];

  try {
    sessions = reader.readAll();
  } catch (err) {
    logger.error('Failed to load trace', { path: reader.path, error: errorMessage(err) });
    process.exit(1);
  }

  if (options.session) {
    sessions = sessions.filter((session) => session.sessionId === options.session);
    if (sessions.length === 0) {
      logger.error('Session not found', { path: reader.path, sessionId: options.session });
      process.exit(1);
    }
  }

  const responder = new MockResponder().load(sessions).start();
  const server = await serveStdio(responder);

  server.onclose = () => {
    responder.stop();
    logger.info('Replay finished', { served: responder.servedCount, misses: responder.missCount });
  };
}
