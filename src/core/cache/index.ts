export { ArtifactStore, InMemoryArtifactStore } from "./artifactStore";
export { FileArtifactStore } from "./fileArtifactStore";
export { CachedArtifactSchema, decodeArtifact, encodeArtifact } from "./artifactCodec";
export { ArtifactInput, buildArtifact, collectDependencies, withValidationResult } from "./artifacts";
export { computeSubmissionHash, isSubmissionHash, normalizeSource } from "./hashing";
export {
  CacheStats,
  CoalesceOutcome,
  CoalescedComputation,
  DeleteOutcome,
  ValidationCache,
} from "./validationCache";
