import mongoose from 'mongoose';
import { Config } from '@/config/index';
import { logger } from '@/utils/logger';

export interface DatabaseConfig {
  uri: string;
  options?: mongoose.ConnectOptions;
}

const defaultConfig: DatabaseConfig = {
  uri: Config.MONGO.CONNECTION_STRING,
  options: { dbName: Config.MONGO.DB_NAME },
};

export const connectDB = async (config: DatabaseConfig = defaultConfig): Promise<typeof mongoose> => {
  try {
    await mongoose.connect(config.uri, config.options);
    return mongoose;
  } catch (error) {
    logger.error('MongoDB connection error:', error);
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

export const isDatabaseConnected = (): boolean =>
  mongoose.connection.readyState === mongoose.ConnectionStates.connected;

mongoose.connection.on('connected', () => {
  logger.info('MongoDB connected');
});

mongoose.connection.on('error', (err) => {
  logger.error('MongoDB connection error:', err);
});

mongoose.connection.on('disconnected', () => {
  logger.info('MongoDB disconnected');
});

export default mongoose;
