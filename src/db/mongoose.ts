import mongoose from 'mongoose';
import type { Logger } from '../common/logger.js';

export async function connectMongo(url: string, logger: Logger): Promise<void> {
  mongoose.set('strictQuery', true);
  await mongoose.connect(url);
  logger.info({ db: mongoose.connection.name }, 'MongoDB connected');
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}
