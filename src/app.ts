import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Config } from '@/config/index';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { requestLogger } from '@/middleware/requestLogger';
import { createSensorRoutes } from '@/routes/sensor.routes';
import { createChatRoutes } from '@/routes/chat.routes';
import { SensorService } from '@/services/sensor.service';
import { ChatService } from '@/services/chat.service';

export interface AppDependencies {
  sensorService: SensorService;
  chatService: ChatService;
  isDatabaseConnected: () => boolean;
}

export const createApp = ({ sensorService, chatService, isDatabaseConnected }: AppDependencies): Express => {
  const app = express();

  // Middleware
  app.use(requestLogger);
  app.use(express.json({ limit: '10kb' }));
  app.use(helmet());
  app.use(cors({ origin: Config.ALLOWED_ORIGINS }));

  app.get('/', (req, res) => {
    res.type('text/html').send('<p>Agro-tech Backend is running!</p>');
  });

  // Health check
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      database: isDatabaseConnected() ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
    });
  });

  // Routes
  app.use(createSensorRoutes(sensorService));
  app.use(createChatRoutes(chatService));

  app.use(notFoundHandler);

  // Error Handler
  app.use(errorHandler);

  return app;
};
