import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

export const config = {
  broadcastify: {
    username: process.env.BCFY_USERNAME || '',
    password: process.env.BCFY_PASSWORD || '',
    credentialKey: process.env.BCFY_CREDENTIAL_KEY || '',
    baseUrl: process.env.BCFY_BASE_URL || 'https://www.broadcastify.com',
    cdnUrl: process.env.BCFY_CDN_URL || 'https://calls.broadcastify.com',
    autoLogout: parseBoolean(process.env.BCFY_AUTO_LOGOUT, true),
    // 0 leaves requests to the transport's own defaults
    requestTimeoutMs: parseInt(process.env.BCFY_REQUEST_TIMEOUT_MS || '0', 10),
  },

  cache: {
    dir: process.env.BCFY_CACHE_DIR || '.bc_cache',
    enabled: parseBoolean(process.env.BCFY_SAVE_CACHE, true),
    ttlHours: parseFloat(process.env.BCFY_CACHE_TTL_HOURS || '24'),
  },

  rateLimits: {
    default: parseInt(process.env.BCFY_RATE_DEFAULT_MS || '1000', 10),
    live: parseInt(process.env.BCFY_RATE_LIVE_MS || '5000', 10),
    archive: parseInt(process.env.BCFY_RATE_ARCHIVE_MS || '2000', 10),
  },

  database: {
    path: process.env.BCFY_DB_PATH || join(__dirname, '../../data/calls.db'),
  },

  logging: {
    verbose: parseBoolean(process.env.BCFY_VERBOSE, false),
  },
};

export type Config = typeof config;
