/**
 * @fileoverview In-memory Store
 *
 * @module @capsulepipe/engine/impl/SimpleStore
 */

import type { Store } from "../contracts/Store.js";

/**
 * Map-backed store: `get`, `set`, `append`, `drop`.
 */
export class SimpleStore implements Store {
    private readonly raw: Map<string, unknown> = new Map();

    set(key: string, value: unknown): void {
        this.raw.set(key, value);
    }

    get(key: string): unknown {
        return this.raw.get(key);
    }

    append(key: string, value: unknown): void {
        const existing = this.raw.get(key);

        if (existing === undefined) {
            this.raw.set(key, [value]);
        }
        else if (Array.isArray(existing)) {
            existing.push(value);
        }
        else {
            this.raw.set(key, [existing, value]);
        }
    }

    drop(key: string): void {
        this.raw.delete(key);
    }

    delete(key: string): void {
        this.drop(key);
    }

    has(key: string): boolean {
        return this.raw.has(key);
    }

    keys(): string[] {
        return Array.from(this.raw.keys());
    }

    clear(): void {
        this.raw.clear();
    }
}
