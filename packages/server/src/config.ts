/**
 * Server Configuration
 *
 * Loads environment variables with sensible defaults for development.
 * In production, all required variables must be set.
 */

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

// Validate required env vars in production
function requireEnv(name: string, devDefault: string): string {
  const value = process.env[name];
  if (isProduction && !value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value || devDefault;
}

const sessionSecret = requireEnv(
  'SESSION_SECRET',
  'dev-session-secret-not-for-production-use'
);
if (sessionSecret.length < 32) {
  throw new Error('SESSION_SECRET must be at least 32 characters long');
}

export const config = {
  // Server
  port: parseInt(process.env.PORT || '3001', 10),
  host: process.env.HOST || '127.0.0.1',
  isProduction,
  isTest,
  logLevel: process.env.LOG_LEVEL || 'info',

  // Storage - ':memory:' is accepted for throwaway databases
  databasePath: process.env.DATABASE_PATH || '',

  // JWT issued by the identity service
  jwt: {
    secret: requireEnv('JWT_SECRET', 'dev-jwt-secret-not-for-production'),
    cookieName: 'access_token',
  },

  session: {
    secret: sessionSecret,
    cookieName: 'sessionId',
    maxAgeMs: 1000 * 60 * 60 * 24,
  },

  // Static dashboard bundle, cache-busted by version
  assets: {
    version: process.env.ASSET_VERSION || '1.0.0',
    prefix: '/static/',
  },

  mail: {
    smtpUrl: process.env.SMTP_URL || '',
    from: process.env.MAIL_FROM || 'Progress Portal <no-reply@localhost>',
  },

  reminders: {
    enabled: process.env.REMINDERS_ENABLED !== 'false' && !isTest,
    cronExpression: '*/15 * * * *',
  },
} as const;

// Warn about insecure defaults in development
if (!isProduction && !isTest) {
  if (!process.env.JWT_SECRET) {
    console.warn('Warning: Using default JWT_SECRET - not secure for production');
  }
  if (!process.env.SESSION_SECRET) {
    console.warn('Warning: Using default SESSION_SECRET - not secure for production');
  }
}

export type Config = typeof config;
