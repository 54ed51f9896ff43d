import { defineConfig } from "drizzle-kit";

const dbFile = process.env.TOOLGATE_AUDIT_DB ?? "./toolgate-audit.db";

export default defineConfig({
  schema: "./agent/src/db/schema.ts",
  out: "./drizzle",
  dialect: "sqlite",
  dbCredentials: {
    url: dbFile,
  },
});
