export {
  DataCloudClient,
  DataCloudAuth,
  BulkIngest,
  IngestJobs,
  QueryRunner,
  StreamingIngest,
  BULK_API_MAX_PAYLOAD_SIZE,
  STREAMING_API_MAX_PAYLOAD_SIZE,
  toRecords,
  orderedColumns,
  type BulkJobApi,
  type FilePaths,
} from './datacloud/client/index.js';
export * from './datacloud/types.js';
export { splitJsonList, chunkByCount } from './datacloud/split/json-chunker.js';
export { splitCsvFile, type FilePart, type SplitFileOptions } from './datacloud/split/file-splitter.js';
export { getConfig, resetConfig, type AppConfig } from './config/config-manager.js';
export { validateEnv } from './config/env-validator.js';
export {
  AppError,
  AuthenticationError,
  DataCloudError,
  JobTimeoutError,
  UpstreamError,
  ValidationError,
} from './shared/errors.js';
export { logger } from './shared/logger.js';
