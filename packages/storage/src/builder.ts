import { Effect, Layer } from "effect"
import { NodeFileSystem } from "@effect/platform-node"
import { DEFAULT_REGION, S3ObjectClientLive, type R2Config } from "./client.js"
import { missingField, type ConfigField, type MissingFieldError } from "./errors.js"
import { R2Operator, makeOperator, type OperatorService } from "./operator.js"

/**
 * Collects connection settings and creates an operator bound to one bucket.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const r2 = yield* new Builder()
 *     .setBucketName("assets")
 *     .setAccessKeyId(accessKeyId)
 *     .setSecretAccessKey(secretAccessKey)
 *     .setEndpoint("https://<account-id>.r2.cloudflarestorage.com")
 *     .createClient()
 *   yield* r2.uploadBinary("hello.txt", "text/plain", new TextEncoder().encode("Hello!"))
 * })
 * ```
 */
export class Builder {
  private bucketName = ""
  private accessKeyId = ""
  private secretAccessKey = ""
  private endpoint = ""
  private region: string = DEFAULT_REGION

  setBucketName(bucketName: string): this {
    this.bucketName = bucketName
    return this
  }

  setAccessKeyId(accessKeyId: string): this {
    this.accessKeyId = accessKeyId
    return this
  }

  setSecretAccessKey(secretAccessKey: string): this {
    this.secretAccessKey = secretAccessKey
    return this
  }

  setEndpoint(endpoint: string): this {
    this.endpoint = endpoint
    return this
  }

  /** Empty resets to "auto" */
  setRegion(region: string): this {
    this.region = region
    return this
  }

  /** Validated snapshot of the current fields */
  toConfig(): Effect.Effect<R2Config, MissingFieldError> {
    const config: R2Config = {
      bucketName: this.bucketName.trim(),
      accessKeyId: this.accessKeyId.trim(),
      secretAccessKey: this.secretAccessKey.trim(),
      endpoint: this.endpoint.trim(),
      region: this.region.trim() || DEFAULT_REGION,
    }

    const required: ConfigField[] = ["bucketName", "accessKeyId", "secretAccessKey", "endpoint"]
    const missing = required.find((field) => config[field].length === 0)
    return missing ? Effect.fail(missingField(missing)) : Effect.succeed(config)
  }

  /** Create an operator; no request is sent */
  createClient(): Effect.Effect<OperatorService, MissingFieldError> {
    return this.toConfig().pipe(
      Effect.flatMap((config) =>
        makeOperator(config.bucketName).pipe(
          Effect.provide(Layer.merge(S3ObjectClientLive(config), NodeFileSystem.layer)),
        ),
      ),
    )
  }

  layer(): Layer.Layer<R2Operator, MissingFieldError> {
    return Layer.effect(R2Operator, this.createClient())
  }
}
