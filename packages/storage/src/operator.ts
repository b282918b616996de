import { Context, Effect, Layer } from "effect"
import { FileSystem } from "@effect/platform"
import { ObjectClient, type ObjectMetadata } from "./client.js"
import { OperationError, toOperationError, type OperationName } from "./errors.js"

export const DEFAULT_CACHE_CONTROL = "no-cache"

/** Page size of listObjects; no continuation is exposed */
export const MAX_LIST_KEYS = 10

// =============================================================================
// Operator Service
// =============================================================================

export interface OperatorService {
  readonly bucketName: string

  /** Store raw bytes; cacheControl defaults to "no-cache" */
  uploadBinary: (
    key: string,
    mimeType: string,
    bytes: Uint8Array,
    cacheControl?: string,
  ) => Effect.Effect<void, OperationError>

  /** Read a local file fully, then store it like uploadBinary */
  uploadFile: (
    key: string,
    mimeType: string,
    filePath: string,
    cacheControl?: string,
  ) => Effect.Effect<void, OperationError>

  download: (key: string) => Effect.Effect<Uint8Array, OperationError>

  delete: (key: string) => Effect.Effect<void, OperationError>

  /** At most MAX_LIST_KEYS keys, in store order */
  listObjects: () => Effect.Effect<ReadonlyArray<string>, OperationError>

  head: (key: string) => Effect.Effect<ObjectMetadata, OperationError>

  exists: (key: string) => Effect.Effect<boolean, OperationError>
}

export class R2Operator extends Context.Tag("r2-operator/R2Operator")<
  R2Operator,
  OperatorService
>() {}

// =============================================================================
// Operator Implementation
// =============================================================================

export const makeOperator = (bucketName: string) =>
  Effect.gen(function* () {
    const client = yield* ObjectClient
    const fs = yield* FileSystem.FileSystem

    const call = <A>(operation: OperationName, key: string, run: () => Promise<A>) =>
      Effect.tryPromise({ try: run, catch: toOperationError(operation, key) })

    const requireKey = (
      operation: OperationName,
      key: string,
    ): Effect.Effect<void, OperationError> =>
      key.length === 0
        ? Effect.fail(
            new OperationError({ operation, key, message: "Object key must not be empty" }),
          )
        : Effect.void

    const logged =
      (operation: OperationName, key: string) =>
      <A, R>(self: Effect.Effect<A, OperationError, R>) =>
        self.pipe(
          Effect.tap(() => Effect.logDebug(`${operation} ok`)),
          Effect.tapError((error) =>
            Effect.logWarning(`${operation} failed: ${error.message}`),
          ),
          Effect.annotateLogs({ bucket: bucketName, key, operation }),
        )

    const put = (
      operation: OperationName,
      key: string,
      mimeType: string,
      body: Uint8Array,
      cacheControl: string | undefined,
    ) =>
      call(operation, key, () =>
        client.putObject({
          bucket: bucketName,
          key,
          body,
          contentType: mimeType,
          cacheControl: cacheControl ?? DEFAULT_CACHE_CONTROL,
        }),
      )

    const fetchHead = (key: string) =>
      requireKey("head", key).pipe(
        Effect.zipRight(call("head", key, () => client.headObject(bucketName, key))),
      )

    const service: OperatorService = {
      bucketName,

      uploadBinary: (key, mimeType, bytes, cacheControl) =>
        requireKey("uploadBinary", key).pipe(
          Effect.zipRight(put("uploadBinary", key, mimeType, bytes, cacheControl)),
          logged("uploadBinary", key),
        ),

      uploadFile: (key, mimeType, filePath, cacheControl) =>
        Effect.gen(function* () {
          yield* requireKey("uploadFile", key)
          const body = yield* fs.readFile(filePath).pipe(
            Effect.mapError(
              (cause) =>
                new OperationError({
                  operation: "uploadFile",
                  key,
                  message: `Failed to read file ${filePath}: ${cause.message}`,
                  cause,
                }),
            ),
          )
          yield* put("uploadFile", key, mimeType, body, cacheControl)
        }).pipe(logged("uploadFile", key)),

      download: (key) =>
        requireKey("download", key).pipe(
          Effect.zipRight(call("download", key, () => client.getObject(bucketName, key))),
          logged("download", key),
        ),

      delete: (key) =>
        requireKey("delete", key).pipe(
          Effect.zipRight(call("delete", key, () => client.deleteObject(bucketName, key))),
          logged("delete", key),
        ),

      listObjects: () =>
        call("listObjects", "", () => client.listObjects(bucketName, MAX_LIST_KEYS)).pipe(
          Effect.map((keys): ReadonlyArray<string> => keys.slice(0, MAX_LIST_KEYS)),
          logged("listObjects", ""),
        ),

      head: (key) => fetchHead(key).pipe(logged("head", key)),

      // 404 is recovered before logging
      exists: (key) =>
        fetchHead(key).pipe(
          Effect.as(true),
          Effect.catchIf(
            (error) => error.status === 404,
            () => Effect.succeed(false),
          ),
          logged("head", key),
        ),
    }

    return service
  })

export const makeOperatorLayer = (bucketName: string) =>
  Layer.effect(R2Operator, makeOperator(bucketName))
