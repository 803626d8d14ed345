/**
 * MongoDB connection (native driver)
 *
 * One client per process. A second connectMongo() returns the open Db.
 */

import { MongoClient, type Db } from 'mongodb';

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectMongo(url: string, dbName: string): Promise<Db> {
  if (db) return db;

  client = new MongoClient(url);
  await client.connect();
  db = client.db(dbName);

  console.log(`[DB] Connected to MongoDB (${dbName})`);
  return db;
}

export async function disconnectMongo(): Promise<void> {
  if (!client) return;
  await client.close();
  client = null;
  db = null;
  console.log('[DB] Disconnected from MongoDB');
}
