// Script to create a user and print an access token for it
// Usage: npm run users:create -- --name "Test Collector" --role collector --commune Gombe

import { loadEnv } from '../config/env';

import { randomUUID } from 'crypto';
import { parseArgs } from 'util';
import { createPool } from '../config/postgres';
import { createSqliteDatabase } from '../config/sqlite';
import { parseRole } from '../lib/permissions';
import { PostgresWasteRepository } from '../repositories/postgres';
import { SqliteWasteRepository } from '../repositories/sqlite';
import { createTokenService } from '../utils/jwt';
import { logger } from '../utils/logger';

async function main() {
  const env = loadEnv();
  const { values } = parseArgs({
    options: {
      name: { type: 'string' },
      role: { type: 'string', default: 'citizen' },
      commune: { type: 'string' },
      subscribed: { type: 'boolean', default: false },
      'token-hours': { type: 'string', default: '24' },
    },
  });

  if (!values.name) {
    throw new Error('--name is required');
  }
  const role = parseRole(values.role);
  if (!role) {
    throw new Error(`Unknown role '${values.role}'`);
  }

  let close: () => Promise<unknown>;
  let repo: PostgresWasteRepository | SqliteWasteRepository;
  if (env.DATABASE_DRIVER === 'postgres' && env.DATABASE_URL) {
    const pool = createPool(env.DATABASE_URL);
    repo = new PostgresWasteRepository(pool);
    close = () => pool.end();
  } else {
    const db = createSqliteDatabase(env.SQLITE_PATH);
    repo = new SqliteWasteRepository(db);
    close = async () => db.close();
  }

  try {
    const user = await repo.insertUser({
      id: randomUUID(),
      fullName: values.name,
      role,
      commune: values.commune ?? null,
      subscriptionActive: values.subscribed ?? false,
    });

    const hours = Number(values['token-hours'] ?? '24');
    const token = createTokenService(env.JWT_SECRET).generateAccessToken(user.id, hours * 60 * 60);

    logger.info({ userId: user.id, role: user.role, commune: user.commune }, '✅ User created');
    process.stdout.write(`${token}\n`);
  } finally {
    await close();
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, '❌ Error creating user');
  process.exit(1);
});
