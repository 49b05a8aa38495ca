/**
 * Mongo client singleton for the native driver.
 * Purpose: single entrypoint to obtain the database handle (`getDb`) and close it (`disconnectDb`).
 */
import { MongoClient, type Db } from "mongodb";
import { loadSettings } from "@/configuration";

let client: MongoClient | null = null;
let dbInstance: Db | null = null;

export async function getDb(): Promise<Db> {
  if (dbInstance) return dbInstance;
  const settings = loadSettings();
  if (!settings.mongoUri) throw new Error("MongoDB URI not configured (MONGO_URI).");
  if (!client) {
    client = new MongoClient(settings.mongoUri);
  }
  await client.connect();
  dbInstance = client.db(settings.dbName);
  return dbInstance;
}

export async function disconnectDb(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  dbInstance = null;
}
