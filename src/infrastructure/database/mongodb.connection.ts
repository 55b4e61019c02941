import { MongoClient, Db } from "mongodb";
import { AppConfig } from "../config/app.config";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectToMongoDB(settings: AppConfig["mongodb"]): Promise<Db> {
  if (db) {
    return db;
  }

  try {
    client = new MongoClient(settings.uri);
    await client.connect();
    db = client.db(settings.dbName);
    console.log(`[MongoDB] Connected to ${settings.dbName}`);
    return db;
  } catch (error) {
    console.error("[MongoDB] Failed to connect:", error);
    client = null;
    throw error;
  }
}

export async function closeMongoDBConnection(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
    console.log("[MongoDB] Connection closed");
  }
}

export function getDb(): Db {
  if (!db) {
    throw new Error("MongoDB not connected. Call connectToMongoDB() first.");
  }
  return db;
}
