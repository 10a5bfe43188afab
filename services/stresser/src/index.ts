export { runStressTest, StressSetupError } from './runner';
export type { RunTermination, StressRun, StressRunDeps } from './runner';
export {
  defaultStresserConfig,
  DEFAULT_PUT_SIZE_KB,
  loadConfigFile,
  mergeConfig,
  OPERATION_TYPES,
  readEnvConfig,
  resolveConfig,
  validateConfig,
} from './config';
export type { ConfigInput, ConfigSources, ConfigValidation, OperationType, StresserConfig } from './config';
export { DurationFormatError, parseDuration, tryParseDuration } from './duration';
export {
  formatError,
  getLogLevel,
  isLogLevel,
  LOG_LEVELS,
  logDebug,
  logError,
  logInfo,
  logWarn,
  setLogLevel,
} from './logging';
export type { LogLevel } from './logging';
export { renderMetrics, stresserRegistry } from './observability';
export { performGet, performPut, selectOperation } from './executor';
export { ResultChannel } from './channel';
export { createKeyPicker, generateWriteKey } from './keys';
export { generatePayload } from './payload';
export { WorkerRng } from './random';
export { buildS3ClientConfig, createS3Client, S3ObjectStore, toObjectBody } from './store/s3';
export type { ObjectBody, ObjectStore } from './store/types';
