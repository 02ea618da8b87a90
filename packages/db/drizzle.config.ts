import { defineConfig } from 'drizzle-kit';

const databaseUrl = process.env.DATABASE_URL;

if (!databaseUrl) {
  throw new Error('DATABASE_URL is required to use drizzle-kit.');
}

export default defineConfig({
  dialect: 'postgresql',
  // Paths resolve against the working directory; `npm run db:generate` runs from the repo root.
  schema: './packages/db/src/schema/conversion-history.ts',
  out: './packages/db/migrations',
  dbCredentials: {
    url: databaseUrl
  }
});
