/**
 * MongoDB connection management.
 *
 * Connects using the native driver and provides a singleton client and
 * Db instance for the application. Transactions need the client, so it
 * is exposed alongside the Db.
 */

import { MongoClient, type Db } from 'mongodb';
import { config } from '../config.js';

let client: MongoClient | null = null;
let db: Db | null = null;

/**
 * Connect to MongoDB. Safe to call multiple times; returns the existing connection.
 */
export async function connectMongo(): Promise<Db> {
  if (db) return db;

  if (!config.mongodbUri) {
    throw new Error('MONGODB_URI is not configured');
  }

  client = new MongoClient(config.mongodbUri);
  await client.connect();
  db = client.db(); // uses the database from the URI
  return db;
}

/**
 * Get the current Db instance. Throws if not connected.
 */
export function getDb(): Db {
  if (!db) {
    throw new Error('MongoDB not connected. Call connectMongo() first.');
  }
  return db;
}

/**
 * Get the connected client (for sessions and transactions).
 */
export function getMongoClient(): MongoClient {
  if (!client) {
    throw new Error('MongoDB not connected. Call connectMongo() first.');
  }
  return client;
}

/**
 * Round-trip to the server; used by the readiness check.
 */
export async function pingMongo(): Promise<boolean> {
  const result = await getDb().command({ ping: 1 });
  return result['ok'] === 1;
}

/**
 * Disconnect from MongoDB. Called during shutdown.
 */
export async function disconnectMongo(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
  }
}
