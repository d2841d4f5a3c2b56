import type { NextFunction, Request, Response } from 'express';

import type { ConversationService } from '@services/conversation/conversation.service.js';

import { toEventJson } from '../serializers/reservation.serializer.js';

import { parseIntentRequest, parseSessionId } from './sessions.validator.js';

export function sessionsController(conversations: ConversationService) {
  return {
    handleIntent: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const sessionId = parseSessionId(req.params.sessionId);
        const { intent, args } = parseIntentRequest(req.body);
        const result = await conversations.handleIntent(sessionId, intent, args);
        res.json({ ...result, events: result.events.map(toEventJson) });
      } catch (err) {
        next(err);
      }
    },

    endSession: async (req: Request, res: Response, next: NextFunction) => {
      try {
        await conversations.endSession(parseSessionId(req.params.sessionId));
        res.sendStatus(204);
      } catch (err) {
        next(err);
      }
    },
  };
}
