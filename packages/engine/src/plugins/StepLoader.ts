/**
 * @fileoverview Step Loader
 *
 * Loads steps from:
 * - YAML files (field mappings: copy values from the input record into an output field)
 * - Code files (JS exporting Step objects)
 *
 * @module @capsulepipe/engine/plugins/StepLoader
 */

import { readFileSync, readdirSync, existsSync } from "fs";
import { join, extname } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import type { PipelineLogger } from "../contracts/Logger.js";
import type { Step } from "../contracts/Step.js";
import { isStep } from "../contracts/Step.js";
import { describeError } from "../contracts/errors.js";
import type { CapsuleStream } from "../core/CapsuleStream.js";
import { consoleLogger, scopeLogger } from "../impl/logging.js";

/**
 * String clean-ups a YAML field mapping may apply, in listed order.
 */
export type FieldTransform =
    | "trim"
    | "lowercase"
    | "uppercase"
    | "collapseWhitespace"
    | "stripTrailingPunctuation";

/**
 * YAML step definition: a field mapping.
 *
 * @example
 * ```yaml
 * - name: publisher
 *   field: publisher
 *   from: imprint.publisher
 *   transforms: [trim, stripTrailingPunctuation]
 * ```
 */
export interface YamlFieldStepDefinition {
    /** Unique name/id for this step */
    name: string;

    /** Human-readable description */
    description?: string;

    /** Output field to write */
    field: string;

    /** Where the values come from, as understood by the SourceResolver */
    from: string;

    /** "set" replaces the field, "append" adds to it (default: set) */
    mode?: "set" | "append";

    /** Clean-ups applied to string values */
    transforms?: FieldTransform[];
}

/**
 * Resolves a `from` expression against an input record.
 */
export type SourceResolver<TInput> = (input: TInput, from: string) => unknown[];

/**
 * Loaded steps result.
 */
export interface LoadedSteps<TInput, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> {
    steps: Step<TInput, TStream>[];

    /** `from` expressions of the YAML steps, in load order */
    sources: string[];
}

/**
 * Step loader configuration.
 */
export interface StepLoaderConfig<TInput> {
    /** Logger for step loading */
    logger?: PipelineLogger;

    /** Resolver for YAML `from` expressions (default: dotted path) */
    resolver?: SourceResolver<TInput>;
}

const kTRANSFORMS: Readonly<Record<FieldTransform, (value: string) => string>> = {
    trim                    : (value) => value.trim(),
    lowercase               : (value) => value.toLowerCase(),
    uppercase               : (value) => value.toUpperCase(),
    collapseWhitespace      : (value) => value.replace(/\s+/g, " "),
    stripTrailingPunctuation: (value) => value.replace(/[\s.,;:/=]+$/, ""),
};

function isFieldTransform(name: unknown): name is FieldTransform {
    return typeof name === "string" && Object.hasOwn(kTRANSFORMS, name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Default resolver: walk `from` as a dotted path. Arrays met along the way
 * are walked element by element, so `fields.tag` collects every tag.
 * Missing segments, `null` and `undefined` yield nothing.
 *
 * @example
 * ```typescript
 * resolveDottedPath({ imprint: { publisher: "Harper" } }, "imprint.publisher"); // ["Harper"]
 * resolveDottedPath({ subjects: [{ term: "Whales" }, { term: "Sea" }] }, "subjects.term"); // ["Whales", "Sea"]
 * ```
 */
export function resolveDottedPath(input: unknown, from: string): unknown[] {
    let current: unknown[] = [input];

    for (const segment of from.split(".")) {
        const next: unknown[] = [];
        for (const value of current.flatMap((item) => (Array.isArray(item) ? item : [item]))) {
            if (isRecord(value) && segment in value) {
                next.push(value[segment]);
            }
        }
        current = next;
    }

    return current
        .flatMap((value) => (Array.isArray(value) ? value : [value]))
        .filter((value) => value !== undefined && value !== null);
}

/**
 * Apply transforms to every string value. Other values pass through;
 * strings left empty are dropped.
 */
export function applyTransforms(values: readonly unknown[], transforms: readonly FieldTransform[]): unknown[] {
    const result: unknown[] = [];
    for (const value of values) {
        if (typeof value !== "string") {
            result.push(value);
            continue;
        }
        const cleaned = transforms.reduce((text, name) => kTRANSFORMS[name](text), value);
        if (cleaned.length > 0) {
            result.push(cleaned);
        }
    }
    return result;
}

/**
 * Create a Step from a YAML field mapping.
 *
 * A mapping that resolves no values leaves the field untouched.
 *
 * @param def - YAML field step definition
 * @param resolver - How `from` is read from the input record
 */
export function createStepFromYaml<TInput, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>>(
    def: YamlFieldStepDefinition,
    resolver: SourceResolver<TInput> = resolveDottedPath
): Step<TInput, TStream> {
    const transforms = def.transforms ?? [];
    const mode = def.mode ?? "set";

    return {
        id         : `yaml:${def.name}`,
        name       : def.name,
        description: def.description,

        process(capsule) {
            const values = applyTransforms(resolver(capsule.input, def.from), transforms);
            if (values.length === 0) {
                return;
            }

            if (mode === "append") {
                capsule.append(def.field, values);
            }
            else {
                capsule.set(def.field, values);
            }
        },
    };
}

/**
 * Step Loader
 *
 * Loads steps from directories containing YAML and/or code files.
 *
 * @example
 * ```typescript
 * const loader = new StepLoader<BibRecord>({ resolver: marcResolver });
 * const { steps } = await loader.loadFromDirectory("./plugins/system");
 *
 * builder.addBag("mapped", ...steps);
 * ```
 */
export class StepLoader<TInput, TStream extends CapsuleStream<TInput> = CapsuleStream<TInput>> {
    private readonly logger: PipelineLogger;
    private readonly resolver: SourceResolver<TInput>;

    constructor(config: StepLoaderConfig<TInput> = {}) {
        this.logger = scopeLogger(config.logger ?? consoleLogger, "StepLoader");
        this.resolver = config.resolver ?? resolveDottedPath;
    }

    /**
     * Load all steps from a directory, in file name order.
     *
     * Scans for:
     * - .yml/.yaml files → YAML field mappings
     * - .js/.mjs files → Code steps
     *
     * @param dirPath - Path to steps directory
     */
    async loadFromDirectory(dirPath: string): Promise<LoadedSteps<TInput, TStream>> {
        const result: LoadedSteps<TInput, TStream> = { steps: [], sources: [] };

        if (!existsSync(dirPath)) {
            this.logger.warn("Step directory does not exist", { dirPath });
            return result;
        }

        let files: string[];
        try {
            files = readdirSync(dirPath).sort();
        }
        catch (error) {
            this.logger.warn("Step path is not a readable directory", {
                dirPath,
                error: describeError(error),
            });
            return result;
        }

        for (const file of files) {
            const filePath = join(dirPath, file);
            const ext = extname(file).toLowerCase();

            try {
                if (ext === ".yml" || ext === ".yaml") {
                    const loaded = this.loadYamlFile(filePath);
                    result.steps.push(...loaded.steps);
                    result.sources.push(...loaded.sources);
                }
                else if (ext === ".js" || ext === ".mjs") {
                    result.steps.push(...(await this.loadCodeFile(filePath)).steps);
                }
            }
            catch (error) {
                this.logger.error("Failed to load step file", {
                    filePath,
                    error: describeError(error),
                });
            }
        }

        this.logger.info("Steps loaded from directory", {
            dirPath,
            steps: result.steps.length,
        });

        return result;
    }

    /**
     * Load field mappings from a YAML file holding one definition or a list of them.
     * Entries that are not field mappings are logged and skipped.
     *
     * @param filePath - Path to YAML file
     */
    loadYamlFile(filePath: string): LoadedSteps<TInput, TStream> {
        const result: LoadedSteps<TInput, TStream> = { steps: [], sources: [] };

        const content = readFileSync(filePath, "utf-8");
        const parsed: unknown = parseYaml(content);

        if (!parsed) {
            return result;
        }

        const definitions: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

        for (const def of definitions) {
            if (this.isYamlFieldStepDefinition(def)) {
                const step = createStepFromYaml<TInput, TStream>(def, this.resolver);
                result.steps.push(step);
                result.sources.push(def.from);
                this.logger.debug("Loaded YAML step", { id: step.id });
            }
            else {
                this.logger.warn("Skipping invalid step definition", { filePath });
            }
        }

        return result;
    }

    /**
     * Load steps from a code file. Named exports, a default export, or a
     * default-exported array of steps are all picked up.
     *
     * @param filePath - Path to JS file
     */
    async loadCodeFile(filePath: string): Promise<LoadedSteps<TInput, TStream>> {
        const result: LoadedSteps<TInput, TStream> = { steps: [], sources: [] };

        const module: Record<string, unknown> = await import(pathToFileURL(filePath).href);

        for (const [key, exported] of Object.entries(module)) {
            const candidates = key === "default" && Array.isArray(exported) ? exported : [exported];
            for (const candidate of candidates) {
                if (isStep<TInput, TStream>(candidate)) {
                    result.steps.push(candidate);
                    this.logger.debug("Loaded code step", { id: candidate.id, export: key });
                }
            }
        }

        return result;
    }

    /**
     * Load steps from multiple directories, in the given order.
     *
     * @param dirPaths - Array of directory paths
     */
    async loadFromDirectories(dirPaths: string[]): Promise<LoadedSteps<TInput, TStream>> {
        const result: LoadedSteps<TInput, TStream> = { steps: [], sources: [] };

        for (const dirPath of dirPaths) {
            const loaded = await this.loadFromDirectory(dirPath);
            result.steps.push(...loaded.steps);
            result.sources.push(...loaded.sources);
        }

        return result;
    }

    /**
     * Type guard for a YAML field mapping.
     */
    private isYamlFieldStepDefinition(obj: unknown): obj is YamlFieldStepDefinition {
        if (!isRecord(obj)) {
            return false;
        }
        if (typeof obj.name !== "string" || typeof obj.field !== "string" || typeof obj.from !== "string") {
            return false;
        }
        if (obj.mode !== undefined && obj.mode !== "set" && obj.mode !== "append") {
            return false;
        }
        if (obj.transforms !== undefined) {
            return Array.isArray(obj.transforms) &&
                obj.transforms.every(isFieldTransform);
        }
        return true;
    }
}
