/**
 * Holdings SQLite Database Reader
 *
 * Reads holdings locations for bibliographic records. This is a read-only
 * service - it never modifies the database.
 *
 * Expected table:
 *   holdings(record_id TEXT NOT NULL, location TEXT NOT NULL)
 */

import Database from "better-sqlite3";
import { existsSync } from "fs";
import type { HoldingsLookup } from "../../domain/streams/HoldingsStream.js";

/**
 * SQLite's default limit on bound parameters per statement
 */
export const kMAX_IDS_PER_QUERY = 32766;

/**
 * Raw holdings row from the database
 */
export interface HoldingRow {
    record_id: string;
    location: string;
}

/**
 * Holdings database reader
 *
 * @example
 * ```typescript
 * const holdings = new HoldingsDatabase("./data/holdings.db");
 * holdings.open();
 * holdings.lookup(["b1000001", "b1000002"]);
 * // Map { "b1000001" => ["MAIN STACKS"], "b1000002" => ["ANNEX", "MAIN STACKS"] }
 * ```
 */
export class HoldingsDatabase implements HoldingsLookup {
    private db: Database.Database | null = null;
    private readonly source: string | Database.Database;

    /**
     * @param source - Path to the database file, or an open connection
     */
    constructor(source: string | Database.Database) {
        this.source = source;
        if (typeof source !== "string") {
            this.db = source;
        }
    }

    /**
     * Open the database connection
     */
    open(): void {
        if (this.db) {
            return;
        }
        if (typeof this.source !== "string") {
            this.db = this.source;
            return;
        }
        if (!existsSync(this.source)) {
            throw new Error(`Holdings database not found at ${this.source}`);
        }

        this.db = new Database(this.source, { readonly: true, fileMustExist: true });
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    /**
     * Get database instance, throwing if not open
     */
    private getDb(): Database.Database {
        if (!this.db) {
            throw new Error("Database not open. Call open() first.");
        }
        return this.db;
    }

    /**
     * Holdings locations for every id: one query per {@link kMAX_IDS_PER_QUERY}
     * ids, so a normal batch is a single query. Ids without holdings are absent
     * from the map.
     */
    lookup(ids: readonly string[]): Map<string, string[]> {
        const table = new Map<string, string[]>();
        const db = this.getDb();

        for (let start = 0; start < ids.length; start += kMAX_IDS_PER_QUERY) {
            const chunk = ids.slice(start, start + kMAX_IDS_PER_QUERY);
            for (const row of this.selectHoldings(db, chunk)) {
                const locations = table.get(row.record_id);
                if (locations) {
                    locations.push(row.location);
                }
                else {
                    table.set(row.record_id, [row.location]);
                }
            }
        }

        return table;
    }

    private selectHoldings(db: Database.Database, ids: readonly string[]): HoldingRow[] {
        const placeholders = ids.map(() => "?").join(", ");
        return db.prepare<unknown[], HoldingRow>(`
            SELECT record_id, location
            FROM holdings
            WHERE record_id IN (${placeholders})
            ORDER BY record_id, location
        `).all(...ids);
    }
}
