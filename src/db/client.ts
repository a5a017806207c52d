/**
 * Store handle
 *
 * A batch run opens exactly one handle, passes it down to the pipeline and
 * closes it when the run ends. Nothing in the library keeps a module-level
 * connection.
 *
 * @module db/client
 */

import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import { databaseUrl, type AppConfig } from "../config";
import * as schema from "./schema";

/**
 * Drizzle database typed with the well schema.
 *
 * Both the node-postgres client used in production and the PGlite client
 * used in tests satisfy this type, as do transactions opened on either.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface WellStore {
    readonly db: Database;
    close(): Promise<void>;
}

/**
 * Connect a single client to the configured PostgreSQL database.
 *
 * @example
 * ```ts
 * const store = await openStore(config)
 * try {
 *   await runBatch(store.db, router, folder)
 * } finally {
 *   await store.close()
 * }
 * ```
 */
export async function openStore(config: AppConfig): Promise<WellStore> {
    const client = new pg.Client({ connectionString: databaseUrl(config) });
    await client.connect();

    const db = drizzle(client, { schema });

    return {
        db,
        close: async () => {
            await client.end();
        },
    };
}
