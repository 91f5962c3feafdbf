import { Router } from 'express';
import { createChatController } from '@/controllers/chat.controller';
import { ChatService } from '@/services/chat.service';

export const createChatRoutes = (chatService: ChatService): Router => {
  const router = Router();
  const controller = createChatController(chatService);

  router.post('/chat', controller.chat);

  return router;
};
