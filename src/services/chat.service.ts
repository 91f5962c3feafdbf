import { ChatRepository } from '@/database/chat.repository';
import { ChatClient } from '@/services/llm.service';
import { validateChatRequest } from '@/services/request-validation.service';
import { AppError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface ChatServiceDependencies {
  client: ChatClient;
  repository: ChatRepository;
}

export interface ChatService {
  /** Returns the assistant's markdown reply. */
  reply(body: unknown): Promise<string>;
}

export const createChatService = ({ client, repository }: ChatServiceDependencies): ChatService => ({
  async reply(body) {
    const validation = validateChatRequest(body);
    if (!validation.valid) {
      throw new AppError('VALIDATION_ERROR', validation.error);
    }

    const { _id, message } = validation.value;
    logger.info(`Chat request from ${_id}: ${message}`);

    const result = await client.complete(message);
    logger.info(`Chat response to ${_id}: ${result.content}`);

    // Storing the exchange is best effort; the log lines above are the audit record
    try {
      await repository.recordExchange({
        device_id: _id,
        message,
        response: result.content,
        model: result.model,
      });
    } catch (error) {
      logger.warn(`Could not store chat exchange for ${_id}:`, error);
    }

    return result.content;
  },
});
