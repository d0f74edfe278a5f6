/**
 * MongoDB Connection
 */

import mongoose from 'mongoose';
import { env } from '../config/env';
import { logger } from './logger';

export async function connectDB(uri: string = env.MONGODB_URI): Promise<typeof mongoose> {
  try {
    const connection = await mongoose.connect(uri);
    logger.info(`MongoDB connected: ${connection.connection.host}/${connection.connection.name}`);
    return connection;
  } catch (error: unknown) {
    logger.error('MongoDB connection error:', error);
    throw error;
  }
}

export async function disconnectDB(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.connection.close();
    logger.info('MongoDB connection closed');
  }
}
