import ChatExchangeModel from '@/models/ChatExchange';
import { ChatExchange } from '@/types/chat.types';

export interface ChatRepository {
  recordExchange(exchange: ChatExchange): Promise<void>;
}

export const mongoChatRepository: ChatRepository = {
  async recordExchange(exchange) {
    await ChatExchangeModel.create(exchange);
  },
};
