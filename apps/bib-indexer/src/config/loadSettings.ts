/**
 * @fileoverview Settings Loader
 *
 * Loads indexer settings from a YAML file, then applies `BIB_INDEXER_*`
 * environment overrides. A missing file leaves the defaults in place. Relative paths in the file resolve against the
 * file's directory; relative paths from the environment resolve against
 * the working directory.
 *
 * @module config/loadSettings
 */

import { readFileSync, existsSync } from "fs";
import { dirname, resolve } from "path";
import { parse as parseYaml } from "yaml";
import { consoleLogger } from "@capsulepipe/engine";
import type { CapsuleErrorPolicy, FieldConflictPolicy, PipelineLogger } from "@capsulepipe/engine";

/**
 * Indexer settings
 */
export interface IndexerSettings {
    /** NDJSON file of bibliographic records */
    inputPath: string;

    /** SQLite file with a `holdings` table; no holdings lookup when absent */
    holdingsDbPath?: string;

    /** SQLite file the documents are upserted into */
    sqliteOutputPath?: string;

    /** NDJSON file the documents are written to */
    ndjsonOutputPath?: string;

    /** Directory of user step files, loaded after the system steps */
    userStepsDir?: string;

    batchSize: number;
    workerPoolSize: number;
    onCapsuleError: CapsuleErrorPolicy;
    onFieldConflict: FieldConflictPolicy;
}

/**
 * Environment variables and the setting each one overrides
 */
export const kENV_OVERRIDES = {
    BIB_INDEXER_INPUT            : "inputPath",
    BIB_INDEXER_HOLDINGS_DB      : "holdingsDbPath",
    BIB_INDEXER_SQLITE_OUTPUT    : "sqliteOutputPath",
    BIB_INDEXER_NDJSON_OUTPUT    : "ndjsonOutputPath",
    BIB_INDEXER_USER_STEPS_DIR   : "userStepsDir",
    BIB_INDEXER_BATCH_SIZE       : "batchSize",
    BIB_INDEXER_WORKER_POOL_SIZE : "workerPoolSize",
    BIB_INDEXER_ON_CAPSULE_ERROR : "onCapsuleError",
    BIB_INDEXER_ON_FIELD_CONFLICT: "onFieldConflict",
} as const satisfies Record<string, keyof IndexerSettings>;

const kPATH_KEYS = ["inputPath", "holdingsDbPath", "sqliteOutputPath", "ndjsonOutputPath", "userStepsDir"] as const;
const kCOUNT_KEYS = ["batchSize", "workerPoolSize"] as const;

type PathKey = (typeof kPATH_KEYS)[number];
type CountKey = (typeof kCOUNT_KEYS)[number];

/**
 * Get default settings.
 */
export function getDefaultSettings(): Omit<IndexerSettings, "inputPath"> {
    return {
        batchSize      : 100,
        workerPoolSize : 4,
        onCapsuleError : "skip",
        onFieldConflict: "warn",
    };
}

function isPathKey(key: string): key is PathKey {
    return kPATH_KEYS.some((candidate) => candidate === key);
}

function isCountKey(key: string): key is CountKey {
    return kCOUNT_KEYS.some((candidate) => candidate === key);
}

function parseCount(key: string, value: unknown): number {
    const count = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof count !== "number" || !Number.isInteger(count) || count < 1) {
        throw new Error(`Invalid setting '${key}': expected a positive integer, got ${JSON.stringify(value)}`);
    }
    return count;
}

function parseCapsuleErrorPolicy(value: unknown): CapsuleErrorPolicy {
    if (value === "skip" || value === "abort") {
        return value;
    }
    throw new Error(`Invalid setting 'onCapsuleError': expected "skip" or "abort", got ${JSON.stringify(value)}`);
}

function parseFieldConflictPolicy(value: unknown): FieldConflictPolicy {
    if (value === "warn" || value === "error") {
        return value;
    }
    throw new Error(`Invalid setting 'onFieldConflict': expected "warn" or "error", got ${JSON.stringify(value)}`);
}

/**
 * Apply one raw value to `settings`.
 */
function applySetting(
    settings: Partial<IndexerSettings>,
    key: string,
    value: unknown,
    baseDir: string
): void {
    if (isPathKey(key)) {
        if (typeof value !== "string" || value.trim() === "") {
            throw new Error(`Invalid setting '${key}': expected a path`);
        }
        settings[key] = resolve(baseDir, value);
    }
    else if (isCountKey(key)) {
        settings[key] = parseCount(key, value);
    }
    else if (key === "onCapsuleError") {
        settings.onCapsuleError = parseCapsuleErrorPolicy(value);
    }
    else if (key === "onFieldConflict") {
        settings.onFieldConflict = parseFieldConflictPolicy(value);
    }
    else {
        throw new Error(`Unknown setting '${key}'`);
    }
}

/**
 * Raw key/value pairs from the settings file; none when it does not exist.
 */
function readSettingsFile(filePath: string, logger: PipelineLogger): object {
    if (!existsSync(filePath)) {
        logger.warn("Settings file not found, using defaults", { filePath });
        return {};
    }

    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8")) ?? {};
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error("Invalid settings file format: expected a mapping");
    }
    return parsed;
}

/**
 * Load settings from a YAML file plus environment overrides.
 *
 * @param filePath - Path to the settings.yml file
 * @param env - Environment to read overrides from
 * @throws Error if the file is not a mapping, or a setting is missing or invalid
 *
 * @example
 * ```typescript
 * const settings = loadSettings("./config/settings.yml");
 * // BIB_INDEXER_BATCH_SIZE=50 overrides batchSize from the file
 * ```
 */
export function loadSettings(
    filePath: string,
    env: NodeJS.ProcessEnv = process.env,
    logger: PipelineLogger = consoleLogger
): IndexerSettings {
    const settings: Partial<IndexerSettings> = getDefaultSettings();
    const baseDir = dirname(resolve(filePath));

    for (const [key, value] of Object.entries(readSettingsFile(filePath, logger))) {
        if (value !== null && value !== undefined) {
            applySetting(settings, key, value, baseDir);
        }
    }

    for (const [variable, key] of Object.entries(kENV_OVERRIDES)) {
        const value = env[variable];
        if (value !== undefined && value !== "") {
            applySetting(settings, key, value, process.cwd());
        }
    }

    const { inputPath } = settings;
    if (inputPath === undefined) {
        throw new Error("Missing setting 'inputPath' (or BIB_INDEXER_INPUT)");
    }

    return { ...getDefaultSettings(), ...settings, inputPath };
}
