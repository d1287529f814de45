import mongoose from 'mongoose';
import type { Env } from '../config/env.js';
import { dbLog } from '../config/logger.js';

let isIntentionalDisconnect = false;
let connectInFlight: Promise<void> | null = null;
let handlersAttached = false;

const onMongoError = (err: unknown) => {
  dbLog.error('MongoDB connection error', { error: err });
};

const onMongoDisconnected = () => {
  if (isIntentionalDisconnect) return;
  dbLog.warn('MongoDB disconnected. Attempting reconnection...');
};

const onMongoConnected = () => {
  dbLog.info('MongoDB connected successfully');
};

const onMongoReconnected = () => {
  dbLog.info('MongoDB reconnected');
};

export async function connectMongo(env: Env): Promise<void> {
  if (mongoose.connection.readyState >= 1) return;
  if (connectInFlight) return connectInFlight;

  connectInFlight = (async () => {
    isIntentionalDisconnect = false;
    mongoose.set('strictQuery', true);

    // connectMongo() may run more than once per process; attach the handlers only once.
    if (!handlersAttached) {
      mongoose.connection.on('error', onMongoError);
      mongoose.connection.on('disconnected', onMongoDisconnected);
      mongoose.connection.on('connected', onMongoConnected);
      mongoose.connection.on('reconnected', onMongoReconnected);
      handlersAttached = true;
    }

    dbLog.info(`MongoDB: connecting to db "${env.MONGODB_DBNAME ?? '(from URI)'}"`);

    await mongoose.connect(env.MONGODB_URI, {
      ...(env.MONGODB_DBNAME ? { dbName: env.MONGODB_DBNAME } : {}),
      // A migration run issues one request at a time.
      maxPoolSize: 5,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      family: 4,
    });
  })().finally(() => {
    connectInFlight = null;
  });

  return connectInFlight;
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  isIntentionalDisconnect = true;
  await mongoose.disconnect();
}
