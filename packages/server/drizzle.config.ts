import { defineConfig } from 'drizzle-kit';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const currentDir = dirname(fileURLToPath(import.meta.url));

// Used for `drizzle-kit studio`; the schema itself is created by startup migrations
export default defineConfig({
  schema: resolve(currentDir, './src/db/schema.ts'),
  dialect: 'sqlite',
  dbCredentials: {
    url: process.env.DATABASE_PATH || resolve(currentDir, '../../data/progress-portal.db'),
  },
});
