// Builder
export { Builder } from "./builder.js"

// Operator
export {
  R2Operator,
  makeOperator,
  makeOperatorLayer,
  DEFAULT_CACHE_CONTROL,
  MAX_LIST_KEYS,
  type OperatorService,
} from "./operator.js"

// Object Client
export {
  ObjectClient,
  S3ObjectClientLive,
  makeS3Client,
  makeS3ObjectClient,
  DEFAULT_REGION,
  type ObjectClientService,
  type ObjectMetadata,
  type PutObjectParams,
  type R2Config,
} from "./client.js"
export {
  MemoryObjectClientLive,
  makeMemoryObjectClient,
  type MemoryObjectClient,
  type RecordedRequest,
  type StoredObject,
} from "./memory.js"

// Errors
export {
  MissingFieldError,
  OperationError,
  ConfigError,
  type ConfigField,
  type OperationName,
} from "./errors.js"

// Config
export {
  parseR2Url,
  toR2Url,
  loadBuilder,
  saveGlobalConfig,
  getConfigPath,
  hasGlobalConfig,
  type LoadOptions,
  type R2UrlParts,
} from "./config.js"
