import { Schema, model } from 'mongoose';
import { COLLECTIONS } from '@/config/constants';
import { ChatExchange } from '@/types/chat.types';

const chatExchangeSchema = new Schema<ChatExchange>({
  device_id: { type: String, required: true, index: true },
  message: { type: String, required: true },
  response: { type: String, required: true },
  model: { type: String, required: true }
}, {
  timestamps: { createdAt: 'created_at', updatedAt: false },
  collection: COLLECTIONS.CHAT_EXCHANGES,
  versionKey: false
});

chatExchangeSchema.index({ device_id: 1, created_at: -1 });

const ChatExchangeModel = model<ChatExchange>('ChatExchange', chatExchangeSchema);

export default ChatExchangeModel;
