import { Knex } from 'knex';
import env from '../app/util/env';

const sqliteFilename = env.nodeEnv === 'test' ? ':memory:' : './db/development.sqlite3';

const configs: Record<string, Knex.Config> = {
  sqlite: {
    client: 'sqlite3',
    connection: {
      filename: sqliteFilename,
    },
    useNullAsDefault: true,
  },
  postgres: {
    client: 'pg',
    connection: env.databaseUrl,
    pool: { min: 2, max: 10 },
  },
};

export default configs[env.databaseType];
