import { config } from "dotenv";
import { defineConfig } from "drizzle-kit";
import { loadConfig, databaseUrl } from "./src/config";

config();

export default defineConfig({
    schema: "./src/db/schema.ts",
    out: "./drizzle",
    dialect: "postgresql",
    dbCredentials: {
        url: databaseUrl(loadConfig()),
    },
});
