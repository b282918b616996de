import { Context, Layer } from "effect"
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3"

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_REGION = "auto"

export interface R2Config {
  bucketName: string
  accessKeyId: string
  secretAccessKey: string
  /** e.g. https://<account-id>.r2.cloudflarestorage.com */
  endpoint: string
  region: string
}

export interface PutObjectParams {
  bucket: string
  key: string
  body: Uint8Array
  contentType: string
  cacheControl: string
}

export interface ObjectMetadata {
  key: string
  size: number
  etag: string
  contentType?: string
  cacheControl?: string
  lastModified?: Date
}

// =============================================================================
// Object Client
// =============================================================================

/**
 * The remote calls the operator is built on. Implementations reject with the
 * store's own error, which the operator maps to an OperationError.
 */
export interface ObjectClientService {
  putObject: (params: PutObjectParams) => Promise<void>
  getObject: (bucket: string, key: string) => Promise<Uint8Array>
  headObject: (bucket: string, key: string) => Promise<ObjectMetadata>
  deleteObject: (bucket: string, key: string) => Promise<void>
  listObjects: (bucket: string, maxKeys: number) => Promise<string[]>
}

export class ObjectClient extends Context.Tag("r2-operator/ObjectClient")<
  ObjectClient,
  ObjectClientService
>() {}

// R2 rejects the CRC checksums newer SDK releases send by default
export const makeS3Client = (config: R2Config): S3Client =>
  new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    requestChecksumCalculation: "WHEN_REQUIRED",
    responseChecksumValidation: "WHEN_REQUIRED",
  })

export const makeS3ObjectClient = (
  config: R2Config,
  s3: S3Client = makeS3Client(config),
): ObjectClientService => ({
  putObject: async ({ bucket, key, body, contentType, cacheControl }) => {
    await s3.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        CacheControl: cacheControl,
      }),
    )
  },

  getObject: async (bucket, key) => {
    const output = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }))
    if (!output.Body) return new Uint8Array(0)
    return output.Body.transformToByteArray()
  },

  headObject: async (bucket, key) => {
    const output = await s3.send(new HeadObjectCommand({ Bucket: bucket, Key: key }))
    return {
      key,
      size: output.ContentLength ?? 0,
      etag: output.ETag?.replace(/"/g, "") ?? "",
      contentType: output.ContentType,
      cacheControl: output.CacheControl,
      lastModified: output.LastModified,
    }
  },

  deleteObject: async (bucket, key) => {
    await s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }))
  },

  listObjects: async (bucket, maxKeys) => {
    const output = await s3.send(
      new ListObjectsV2Command({ Bucket: bucket, MaxKeys: maxKeys }),
    )
    return (output.Contents ?? []).flatMap((object) => (object.Key ? [object.Key] : []))
  },
})

// =============================================================================
// Layers
// =============================================================================

export const S3ObjectClientLive = (config: R2Config) =>
  Layer.sync(ObjectClient, () => makeS3ObjectClient(config))
