/**
 * Drizzle Kit Configuration
 *
 * Used by drizzle-kit to generate migrations into ./drizzle from the
 * schema in src/storage/schema.ts, and by Drizzle Studio for inspection.
 * The engine applies the generated migrations at startup.
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',

  out: './drizzle',

  dialect: 'sqlite',

  dbCredentials: {
    url: process.env.DATABASE_PATH || './adaptive-sessions.db',
  },

  verbose: true,

  // Ask before destructive statements
  strict: true,
});
