import { MongoClient } from 'mongodb';
import { env } from '../config/env.js';
import { logger } from '../lib/logger.js';

const databaseLogger = logger.child({ module: 'mongodb' });

let client: MongoClient | null = null;

/**
 * Open the shared MongoDB client.
 *
 * The database name comes from the connection string path.
 *
 * @returns Connected client
 */
export async function connectDatabase(): Promise<MongoClient> {
  if (client) {
    return client;
  }

  const mongo = new MongoClient(env.MONGODB_URI, {
    maxPoolSize: 20,
    serverSelectionTimeoutMS: 5000
  });

  mongo.on('serverHeartbeatFailed', event => databaseLogger.warn({ connectionId: event.connectionId }, 'MongoDB heartbeat failed'));

  await mongo.connect();
  databaseLogger.info('MongoDB connected');

  client = mongo;
  return mongo;
}

export async function disconnectDatabase() {
  if (!client) {
    return;
  }
  await client.close();
  client = null;
  databaseLogger.info('MongoDB disconnected');
}
