import { Router } from 'express';

import type { ConversationService } from '@services/conversation/conversation.service.js';

import { sessionsController } from '../controllers/sessions.controller.js';

export default function sessionsRoutes(conversations: ConversationService): Router {
  const router = Router();
  const ctrl = sessionsController(conversations);
  router.post('/sessions/:sessionId/intents', ctrl.handleIntent);
  router.delete('/sessions/:sessionId', ctrl.endSession);
  return router;
}
