import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { formatReplayKey, replayKey } from '../../replay/canonical.js';
import type { ReplayIndex } from '../../replay/index-builder.js';
import { JsonObjectSchema, JsonValueSchema } from '../../tracer/serialize.js';
import { OPERATIONS, type JsonObject, type JsonValue } from '../../tracer/types.js';

export const ReplayRequestSchema = z.object({
  method: z.enum(OPERATIONS),
  args: z.array(JsonValueSchema).default([]),
  kwargs: JsonObjectSchema.default({}),
});

export interface ReplayReply {
  status: number;
  body: { [key: string]: JsonValue | undefined };
}

/** Look up a recorded response for an HTTP replay request */
export function answerReplayRequest(index: ReplayIndex, input: unknown): ReplayReply {
  const parsed = ReplayRequestSchema.safeParse(input);
  if (!parsed.success) {
    return {
      status: 400,
      body: { error: 'Invalid replay request', issues: parsed.error.issues.map((issue) => issue.message) },
    };
  }

  const { method, args, kwargs } = parsed.data;
  const key = replayKey(method, { args, kwargs });
  const entry = index.lookup(key);
  const keyJson: JsonObject = { method: key.method, signature: key.signature };

  if (!entry) {
    return {
      status: 404,
      body: { error: `No recorded response for ${formatReplayKey(key)}`, key: keyJson },
    };
  }

  const { response } = entry;
  return {
    status: 200,
    body: {
      key: keyJson,
      session_id: entry.sessionId,
      success: response.success,
      result: response.result,
      error: response.error,
      error_code: response.errorCode,
    },
  };
}

export function createReplayRouter(index: ReplayIndex): Router {
  const router = Router();

  router.get('/catalog', (_req: Request, res: Response) => {
    res.json({ ...index.catalog, serverInfo: index.handshake.serverInfo, stats: index.stats });
  });

  router.post('/replay', (req: Request, res: Response) => {
    const reply = answerReplayRequest(index, req.body);
    res.status(reply.status).json(reply.body);
  });

  return router;
}
