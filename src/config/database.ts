import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { logger } from '../utils/logger';
import { env } from './env';

const isProd = env.NODE_ENV === 'production';

const queryClient = postgres({
  host: env.DB_HOST,
  port: env.DB_PORT,
  username: env.DB_USER,
  password: env.DB_PASSWORD,
  database: env.DB_NAME,
  max: isProd ? 10 : 5,
  idle_timeout: 20,
  connect_timeout: isProd ? 5 : 10,
  onnotice: () => {},
  ssl: isProd ? 'require' : false,
});

export const db = drizzle(queryClient);

export type Database = typeof db;

export async function testConnection(): Promise<boolean> {
  try {
    await queryClient`SELECT 1`;
    logger.info('Database connection successful');
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  await queryClient.end();
}
