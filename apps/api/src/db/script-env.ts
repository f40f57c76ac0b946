import * as path from 'path';
import * as dotenv from 'dotenv';
import { Client } from 'pg';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { loadDatabaseConfig } from '../config';
import * as schema from './schema';

/** Opens a drizzle session for the maintenance scripts; the caller ends the client. */
export async function openScriptDb(): Promise<{ client: Client; db: NodePgDatabase<typeof schema> }> {
  dotenv.config({ path: path.resolve(process.cwd(), '.env') });
  dotenv.config({ path: path.resolve(process.cwd(), '../.env') });
  const database = loadDatabaseConfig(process.env);
  const client = new Client({ ...database });
  await client.connect();
  return { client, db: drizzle(client, { schema }) };
}
