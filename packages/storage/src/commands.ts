import { Console, Effect } from "effect"
import { FileSystem } from "@effect/platform"
import { R2Operator } from "./operator.js"

export const DEFAULT_MIME_TYPE = "application/octet-stream"

export type Command =
  | { _tag: "Init" }
  | { _tag: "Status" }
  | { _tag: "Help" }
  | {
      _tag: "Upload"
      key: string
      filePath: string
      mimeType: string
      cacheControl?: string
    }
  | { _tag: "Download"; key: string; outFile: string }
  | { _tag: "Delete"; key: string }
  | { _tag: "List" }

export type StorageCommand = Extract<Command, { _tag: "Upload" | "Download" | "Delete" | "List" }>

const help: Command = { _tag: "Help" }

/** Commands missing a required argument fall back to help */
export const parseCommand = (args: ReadonlyArray<string>): Command => {
  const [name, ...rest] = args

  switch (name) {
    case "init":
    case "setup":
      return { _tag: "Init" }
    case "status":
    case "info":
      return { _tag: "Status" }
    case "upload": {
      const [key, filePath, mimeType, cacheControl] = rest
      if (!key || !filePath) return help
      return {
        _tag: "Upload",
        key,
        filePath,
        mimeType: mimeType || DEFAULT_MIME_TYPE,
        cacheControl: cacheControl || undefined,
      }
    }
    case "download": {
      const [key, outFile] = rest
      if (!key || !outFile) return help
      return { _tag: "Download", key, outFile }
    }
    case "delete": {
      const [key] = rest
      if (!key) return help
      return { _tag: "Delete", key }
    }
    case "list":
      return { _tag: "List" }
    default:
      return help
  }
}

export const isStorageCommand = (command: Command): command is StorageCommand =>
  command._tag === "Upload" ||
  command._tag === "Download" ||
  command._tag === "Delete" ||
  command._tag === "List"

export const runStorageCommand = (command: StorageCommand) =>
  Effect.gen(function* () {
    const r2 = yield* R2Operator

    switch (command._tag) {
      case "Upload": {
        yield* r2.uploadFile(command.key, command.mimeType, command.filePath, command.cacheControl)
        yield* Console.log(`Uploaded ${command.filePath} -> ${r2.bucketName}/${command.key}`)
        return
      }
      case "Download": {
        const fs = yield* FileSystem.FileSystem
        const bytes = yield* r2.download(command.key)
        yield* fs.writeFile(command.outFile, bytes)
        yield* Console.log(
          `Downloaded ${r2.bucketName}/${command.key} (${bytes.byteLength} bytes) -> ${command.outFile}`,
        )
        return
      }
      case "Delete": {
        yield* r2.delete(command.key)
        yield* Console.log(`Deleted ${r2.bucketName}/${command.key}`)
        return
      }
      case "List": {
        const keys = yield* r2.listObjects()
        if (keys.length === 0) {
          yield* Console.log("(no objects)")
          return
        }
        for (const key of keys) {
          yield* Console.log(`  - ${key}`)
        }
        return
      }
    }
  })

export const usage = [
  "r2-operator CLI",
  "",
  "Commands:",
  "  init                                   - Save R2 credentials to the global config",
  "  status                                 - Show current configuration",
  "  upload <key> <file> [mime] [cache]     - Upload a local file",
  "  download <key> <out-file>              - Download an object",
  "  delete <key>                           - Delete an object",
  "  list                                   - List up to 10 objects",
].join("\n")
