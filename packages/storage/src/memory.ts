import { Layer } from "effect"
import { NoSuchKey } from "@aws-sdk/client-s3"
import { ObjectClient, type ObjectClientService, type ObjectMetadata } from "./client.js"

// =============================================================================
// In-memory Object Client
// =============================================================================

export interface StoredObject {
  body: Uint8Array
  contentType: string
  cacheControl: string
  etag: string
  lastModified: Date
}

export interface RecordedRequest {
  method: "put" | "get" | "head" | "delete" | "list"
  bucket: string
  key?: string
}

export interface MemoryObjectClient extends ObjectClientService {
  /** Every request received, oldest first */
  readonly requests: ReadonlyArray<RecordedRequest>
  /** Objects currently stored in a bucket */
  objects: (bucket: string) => ReadonlyMap<string, StoredObject>
}

const noSuchKey = (key: string) =>
  new NoSuchKey({
    message: `The specified key does not exist: ${key}`,
    $metadata: { httpStatusCode: 404 },
  })

/**
 * Object client holding everything in process memory, with the semantics of
 * an S3 bucket: keys listed in lexicographic order, deletes of missing keys
 * succeed, reads of missing keys reject with NoSuchKey.
 */
export const makeMemoryObjectClient = (): MemoryObjectClient => {
  const buckets = new Map<string, Map<string, StoredObject>>()
  const requests: RecordedRequest[] = []
  let version = 0

  const bucketOf = (bucket: string) => {
    let objects = buckets.get(bucket)
    if (!objects) {
      objects = new Map()
      buckets.set(bucket, objects)
    }
    return objects
  }

  const find = (bucket: string, key: string) => {
    const object = bucketOf(bucket).get(key)
    if (!object) throw noSuchKey(key)
    return object
  }

  return {
    requests,
    objects: (bucket) => bucketOf(bucket),

    putObject: async ({ bucket, key, body, contentType, cacheControl }) => {
      requests.push({ method: "put", bucket, key })
      version += 1
      bucketOf(bucket).set(key, {
        body: body.slice(),
        contentType,
        cacheControl,
        etag: version.toString(16).padStart(8, "0"),
        lastModified: new Date(),
      })
    },

    getObject: async (bucket, key) => {
      requests.push({ method: "get", bucket, key })
      return find(bucket, key).body.slice()
    },

    headObject: async (bucket, key): Promise<ObjectMetadata> => {
      requests.push({ method: "head", bucket, key })
      const object = find(bucket, key)
      return {
        key,
        size: object.body.byteLength,
        etag: object.etag,
        contentType: object.contentType,
        cacheControl: object.cacheControl,
        lastModified: object.lastModified,
      }
    },

    deleteObject: async (bucket, key) => {
      requests.push({ method: "delete", bucket, key })
      bucketOf(bucket).delete(key)
    },

    listObjects: async (bucket, maxKeys) => {
      requests.push({ method: "list", bucket })
      return [...bucketOf(bucket).keys()].sort().slice(0, maxKeys)
    },
  }
}

export const MemoryObjectClientLive = (client: ObjectClientService = makeMemoryObjectClient()) =>
  Layer.succeed(ObjectClient, client)
