/**
 * @fileoverview Core barrel exports
 *
 * @module @capsulepipe/engine/core
 */

export { Capsule, ForkedCapsule, type CapsuleOptions } from "./Capsule.js";
export { CapsuleStream, type BatchInfo, type StreamFactory } from "./CapsuleStream.js";
export { BaseStage, joinStagePath } from "./BaseStage.js";
export { Subpipe, type SubpipeMember } from "./Subpipe.js";
export { Bag, type BagMember } from "./Bag.js";
export { StageRun, type StageStatus } from "./StageRun.js";
export { runBounded } from "./workerPool.js";
