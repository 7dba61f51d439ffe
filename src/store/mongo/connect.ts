import { MongoClient, Db } from "mongodb";
import { Logger, silentLogger } from "../../logging/logger";

export interface MongoConnectionOptions {
  uri: string;
  dbName: string;

  /**
   * How long to wait for a reachable server before giving up (ms)
   */
  serverSelectionTimeoutMs?: number;
  logger?: Logger;
}

export interface MongoConnection {
  client: MongoClient;
  db: Db;
}

/**
 * Connect and verify the server answers, so a bad URI fails at startup
 * rather than on the first job
 */
export async function connectMongo(options: MongoConnectionOptions): Promise<MongoConnection> {
  const logger = options.logger ?? silentLogger;
  const client = new MongoClient(options.uri, {
    serverSelectionTimeoutMS: options.serverSelectionTimeoutMs ?? 10000,
  });

  await client.connect();
  try {
    await client.db(options.dbName).command({ ping: 1 });
  } catch (err) {
    await client.close();
    throw err;
  }

  logger.info("Connected to MongoDB", { db: options.dbName });
  return { client, db: client.db(options.dbName) };
}
