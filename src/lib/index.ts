export * from "./types";
export * from "./errors";
export {
  loadExecutorConfig,
  SamplingParamsSchema,
  DEFAULT_MODEL_ID,
  DEFAULT_FALLBACK_MODEL_ID,
  PARAMETERLESS_MODEL_ID,
  DEFAULT_TOKEN_LIMIT,
  type ExecutorConfig,
  type ExecutorConfigInput,
} from "./config";
export {
  createModelRegistry,
  calculateCost,
  DEFAULT_PRICES,
  DEFAULT_TOKEN_LIMITS,
  MODELS,
  type ModelRegistry,
  type PriceTable,
} from "./models";
export {
  createTokenAccountant,
  tiktokenEncoderFor,
  type TokenAccountant,
  type TokenEncoder,
} from "./execution/token-accounting";
export { partition, planPartition, findSplitPoint, type PartitionPlan } from "./execution/partition";
export { mergeResults, mergeMappings, addUsage, emptyUsage } from "./execution/merge";
export {
  createChunkExecutor,
  createExecutionRequest,
  createExecutorFromConfig,
  type ChunkExecutor,
  type ChunkExecutorOptions,
  type ExecuteOptions,
} from "./execution/executor";
export type { ModelCaller, ModelCallRequest, ModelCallResult } from "./execution/model-caller";
export { createOpenAIModelCaller } from "./openai/caller";
export { createHttpModelCaller } from "./openai_chat";
export { AssignedFilesSchema, type AssignedFilesList } from "./extraction/assigned-files-schema";
export { verifyVerbatim, expectVerbatim, normalizeForComparison } from "./verification/verbatim";
export { verifySequence, expectValidSequence, cleanLabel, MAX_SEQUENCE_SPAN } from "./verification/sequence";
export { romanToInt, intToRoman, isRomanNumeral } from "./verification/roman";
export { checkExtractions, ExtractionFileSchema, type ExtractionReport } from "./verification/report";
