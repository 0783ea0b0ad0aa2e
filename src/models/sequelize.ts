// src/models/sequelize.ts
import { Sequelize } from 'sequelize';
import { env } from '../config/env.config.js';
import { errorMessage } from '../utils/imageError.util.js';

let _sequelize: Sequelize | null = null;

function buildSequelize(url: string): Sequelize {
  let useSsl: boolean;

  if (env.dbSsl === 'true') {
    useSsl = true;
  } else if (env.dbSsl === 'false') {
    useSsl = false;
  } else {
    useSsl = env.isProd;
  }

  return new Sequelize(url, {
    dialect: 'postgres',
    logging: false,
    dialectOptions: useSsl ? { ssl: { require: true, rejectUnauthorized: false } } : {},
    pool: { max: 10, min: 0, idle: 10_000 },
  });
}

export const db = {
  get isConfigured(): boolean {
    return Boolean(env.databaseUrl);
  },

  instance(): Sequelize | null {
    if (!this.isConfigured) return null;
    _sequelize ??= buildSequelize(env.databaseUrl);
    return _sequelize;
  },

  async ping(): Promise<{ ok: boolean; error?: string }> {
    const s = this.instance();
    if (!s) return { ok: false, error: 'DATABASE_URL not set' };
    try {
      await s.authenticate();
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errorMessage(err) || 'DB auth failed' };
    }
  },
};
