import express, { type Request, type Response } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { StateIntegrityError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { SessionStore } from '../sessionStore.js';

const MessageBody = z.object({
  text: z.string().trim().min(1, 'text must not be empty').max(4000),
  sessionId: z.string().min(1).optional()
});

const SessionBody = z.object({ sessionId: z.string().min(1).optional() }).passthrough();

function resolveSessionId(req: Request, res: Response, fromBody: string | undefined): string {
  if (fromBody) return fromBody;
  const cookie: unknown = req.cookies?.sessionId;
  if (typeof cookie === 'string' && cookie) return cookie;
  const sessionId = uuid();
  res.cookie('sessionId', sessionId, { httpOnly: true });
  return sessionId;
}

function sendError(res: Response, log: Logger, error: unknown) {
  if (error instanceof StateIntegrityError) {
    log.error({ err: error.message }, '[Agent] rejected session state');
    res.status(409).json({ error: 'Session state rejected', details: error.message });
    return;
  }
  log.error({ err: errorMessage(error) }, '[Agent] request failed');
  res.status(500).json({ error: 'Internal Server Error', details: errorMessage(error) });
}

export function createAgentRouter(sessions: SessionStore, log: Logger) {
  const router = express.Router();

  router.post('/', async (req, res) => {
    const body = MessageBody.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Bad Request', details: body.error.issues.map(i => i.message).join('; ') });
      return;
    }
    const sessionId = resolveSessionId(req, res, body.data.sessionId);
    try {
      const result = await sessions.process(sessionId, body.data.text);
      res.json({
        sessionId,
        response: result.responseText,
        parameters: result.state.parameters,
        parameterVersion: result.state.parameterVersion,
        turns: result.turns,
        errors: result.errors,
        plan: result.plan,
        summary: result.state.contextSummary,
        lastSimulation: result.state.lastSimulation
      });
    } catch (error) {
      sendError(res, log, error);
    }
  });

  router.get('/state', async (req, res) => {
    const sessionId = resolveSessionId(req, res, typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined);
    try {
      const state = await sessions.getSession(sessionId);
      res.json({
        sessionId,
        parameters: state.parameters,
        parameterVersion: state.parameterVersion,
        summary: state.contextSummary,
        lastSimulation: state.lastSimulation,
        log: state.log
      });
    } catch (error) {
      sendError(res, log, error);
    }
  });

  router.post('/reset', async (req, res) => {
    const body = SessionBody.safeParse(req.body ?? {});
    const sessionId = resolveSessionId(req, res, body.success ? body.data.sessionId : undefined);
    try {
      await sessions.resetSession(sessionId);
      res.json({ sessionId, reset: true });
    } catch (error) {
      sendError(res, log, error);
    }
  });

  return router;
}
