import { NextFunction, Request, Response } from 'express';
import { ChatService } from '@/services/chat.service';

export const createChatController = (chatService: ChatService) => ({
  chat: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const reply = await chatService.reply(req.body);
      res.status(200).type('text/plain').send(reply);
    } catch (error) {
      next(error);
    }
  },
});
