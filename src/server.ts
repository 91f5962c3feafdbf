import { createApp } from './app';
import { Config } from '@/config/index';
import { connectDB, disconnectDB, isDatabaseConnected } from '@/database/connection';
import { mongoSensorRepository } from '@/database/sensor.repository';
import { mongoChatRepository } from '@/database/chat.repository';
import { LLM_CONFIG } from '@/config/constants';
import { createChatClient, createChatHttpClient, loadPromptTemplate } from '@/services/llm.service';
import { createRemotePredictor, heuristicPredictor } from '@/services/prediction.service';
import { createSensorService } from '@/services/sensor.service';
import { createChatService } from '@/services/chat.service';
import { logger } from '@/utils/logger';

async function startServer() {
  try {
    // Connect to MongoDB
    await connectDB();
    logger.info('✓ MongoDB connected');

    if (!Config.AI.API_KEY) {
      logger.warn('⚠ OPENAI_API not configured - /chat requests will fail');
    }

    const systemPrompt = await loadPromptTemplate(LLM_CONFIG.SYSTEM_PROMPT_TEMPLATE);
    const chatClient = createChatClient({
      http: createChatHttpClient(Config.AI.BASE_URL, Config.AI.API_KEY, Config.AI.REQUEST_TIMEOUT_MS),
      model: Config.AI.MODEL,
      systemPrompt,
    });
    logger.info(`✓ Chat client ready (model ${Config.AI.MODEL})`);

    const predictor = Config.PREDICTOR_URL ? createRemotePredictor(Config.PREDICTOR_URL) : heuristicPredictor;
    logger.info(`✓ Flammability predictor: ${Config.PREDICTOR_URL ?? 'local heuristic'}`);

    const app = createApp({
      sensorService: createSensorService({ repository: mongoSensorRepository, predictor }),
      chatService: createChatService({ client: chatClient, repository: mongoChatRepository }),
      isDatabaseConnected,
    });

    // Start Express server
    const server = app.listen(Config.PORT, () => {
      logger.info(`✓ Server running on port ${Config.PORT}`);
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      server.close(() => {
        disconnectDB()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error('Error while disconnecting MongoDB:', error);
            process.exit(1);
          });
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
