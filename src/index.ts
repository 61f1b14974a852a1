export {
  CyclicAncestryError,
  HeredityError,
  ImpossibleEvidenceError,
  InvalidProbabilityTablesError,
  MalformedRecordError,
} from "./lib/errors";
export type { HeredityErrorCode } from "./lib/errors";
export { buildFamilyGraph, familyRecords } from "./lib/familyGraph";
export type { FamilyGraph, Person } from "./lib/familyGraph";
export {
  accumulatePartition,
  countAssignments,
  createAccumulator,
  enumerateAssignments,
  infer,
  inheritedGeneProbability,
  jointProbability,
  mergeAccumulators,
  normalizeAccumulator,
  normalizeTally,
  transmissionProbability,
  updateAccumulator,
} from "./lib/heredityInference";
export type { EnumerationOptions, Partition } from "./lib/heredityInference";
export {
  DEFAULT_PROBABILITY_TABLES,
  loadProbabilityTables,
  parseProbabilityTables,
  validateProbabilityTables,
} from "./lib/probabilityTables";
export {
  loadFamilyCsv,
  loadFamilyRecords,
  parseFamilyCsv,
  parseFamilyJson,
} from "./lib/loadFamilyCsv";
export { distributionsToJson, formatDistributions } from "./lib/formatDistributions";
export type { FormatOptions } from "./lib/formatDistributions";
export { clearInferenceCache, inferInWorkers } from "./workers/inferencePool";
export type {
  InferInWorkersOptions,
  InferenceWorkerHandle,
  SpawnWorker,
} from "./workers/inferencePool";
export { GENE_COUNTS, TRAIT_VALUES } from "./types/familyRecords";
export type {
  Accumulator,
  Assignment,
  FamilyRecord,
  GeneCount,
  GeneDistribution,
  PersonDistribution,
  PersonState,
  PersonTally,
  ProbabilityTables,
  TraitDistribution,
} from "./types/familyRecords";
