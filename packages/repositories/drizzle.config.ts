import { defineConfig } from 'drizzle-kit';

// Migrations are generated from the Drizzle schema; 0000_initial.sql is also
// what the PGlite test databases load.
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './drizzle',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/waypoint',
  },
  strict: true,
  verbose: true,
});
