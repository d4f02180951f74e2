import { Router, Request, Response } from 'express';
import { errorMessage } from '../../errors.js';
import { sessionToWire } from '../../tracer/serialize.js';
import type { TraceReader } from '../../tracer/store.js';
import type { JsonObject, Session } from '../../tracer/types.js';
import { logger } from '../../utils/logger.js';

export interface SessionSummary {
  sessionId: string;
  startedAt: string;
  endedAt: string | null;
  serverInfo: JsonObject;
  totalCalls: number;
  totalErrors: number;
  unanswered: number;
  methods: string[];
}

export function summarizeSession(session: Session): SessionSummary {
  return {
    sessionId: session.sessionId,
    startedAt: session.startedAt,
    endedAt: session.endedAt,
    serverInfo: session.serverInfo,
    totalCalls: session.calls.length,
    totalErrors: session.calls.filter((call) => call.response && !call.response.success).length,
    unanswered: session.calls.filter((call) => !call.response).length,
    methods: [...new Set(session.calls.map((call) => call.request.method))].sort(),
  };
}

export function createSessionsRouter(reader: TraceReader): Router {
  const router = Router();

  // List sessions in the trace file
  router.get('/', (_req: Request, res: Response) => {
    try {
      const sessions = reader.readAll().map(summarizeSession);
      res.json({ sessions, total: sessions.length, skippedLines: reader.lastReadStats.skipped });
    } catch (err) {
      logger.error('Error listing sessions', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to read trace file' });
    }
  });

  // Get one session in trace file format
  router.get('/:sessionId', (req: Request, res: Response) => {
    try {
      const sessionId = String(req.params.sessionId);
      const session = reader.readById(sessionId);
      if (!session) {
        res.status(404).json({ error: 'Session not found' });
        return;
      }
      res.json(sessionToWire(session));
    } catch (err) {
      logger.error('Error getting session', { error: errorMessage(err) });
      res.status(500).json({ error: 'Failed to read trace file' });
    }
  });

  return router;
}
