import { config } from "dotenv";
import { resolve } from "path";
import { defineConfig } from "drizzle-kit";

// .env lives at the repository root; drizzle-kit is run from there
config({ path: resolve(process.cwd(), ".env") });

export default defineConfig({
  dialect: "postgresql",
  schema: "./packages/db/src/schema/index.ts",
  out: "./packages/db/migrations",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "",
  },
});
