import { defineConfig } from 'drizzle-kit';

const dbUrl = process.env.DATABASE_URL;

if (!dbUrl) {
  throw new Error('DATABASE_URL is not set. drizzle-kit needs it to reach the analytics database.');
}

export default defineConfig({
  // Hand-written migrations (views, refresh function) live in ./migrations;
  // drizzle-kit output stays separate so run-migrations never picks it up.
  out: './drizzle',
  schema: './shared/analytics-schema.ts',
  dialect: 'postgresql',
  dbCredentials: {
    url: dbUrl,
  },
});
