/**
 * @fileoverview Step loader barrel exports
 *
 * @module @capsulepipe/engine/plugins
 */

export {
    StepLoader,
    createStepFromYaml,
    resolveDottedPath,
    applyTransforms,
    type FieldTransform,
    type YamlFieldStepDefinition,
    type SourceResolver,
    type LoadedSteps,
    type StepLoaderConfig,
} from "./StepLoader.js";
