import { TaggedError } from "effect/Data"
import { S3ServiceException } from "@aws-sdk/client-s3"

// =============================================================================
// Errors
// =============================================================================

export type ConfigField = "bucketName" | "accessKeyId" | "secretAccessKey" | "endpoint"

export type OperationName =
  | "uploadBinary"
  | "uploadFile"
  | "download"
  | "delete"
  | "listObjects"
  | "head"

/** A required builder field was empty when the client was requested */
export class MissingFieldError extends TaggedError("MissingField")<{
  field: ConfigField
  message: string
}> {}

export class OperationError extends TaggedError("OperationError")<{
  operation: OperationName
  /** Object key, empty for bucket-level calls */
  key: string
  message: string
  /** HTTP status from the store, when it answered */
  status?: number
  cause?: unknown
}> {}

export class ConfigError extends TaggedError("ConfigError")<{
  message: string
}> {}

export const missingField = (field: ConfigField) =>
  new MissingFieldError({ field, message: `Missing required field: ${field}` })

const describe = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause)

const statusOf = (cause: unknown): number | undefined =>
  cause instanceof S3ServiceException ? cause.$metadata.httpStatusCode : undefined

/** Wrap a failure of the underlying client */
export const toOperationError =
  (operation: OperationName, key: string) =>
  (cause: unknown): OperationError =>
    new OperationError({
      operation,
      key,
      message: describe(cause),
      status: statusOf(cause),
      cause,
    })
