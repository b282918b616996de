#!/usr/bin/env node
import { Console, Effect } from "effect"
import { NodeFileSystem, NodeRuntime } from "@effect/platform-node"
import { existsSync } from "node:fs"
import {
  isStorageCommand,
  parseCommand,
  runStorageCommand,
  usage,
  type StorageCommand,
} from "./commands.js"
import { getConfigPath, hasGlobalConfig, loadBuilder, saveGlobalConfig, toR2Url } from "./config.js"
import { makePrompter, type Prompter } from "./prompts.js"

async function init() {
  const prompter = makePrompter(process.stdin, process.stdout)
  try {
    await setup(prompter)
  } finally {
    prompter.close()
  }
}

async function setup({ ask, askSecret }: Prompter) {
  console.log("=== r2-operator setup ===\n")

  if (hasGlobalConfig()) {
    console.log(`Existing config found at ${getConfigPath()}`)
    const overwrite = await ask("Overwrite? (y/N): ")
    if (overwrite.toLowerCase() !== "y") {
      console.log("Keeping existing config.")
      return
    }
    console.log("")
  }

  console.log("Create an R2 API token in the Cloudflare dashboard")
  console.log("(R2 Object Storage -> Manage R2 API Tokens, Object Read & Write).")
  console.log("Your Account ID is in the dashboard URL: dash.cloudflare.com/<ACCOUNT_ID>/r2\n")

  const accountId = (await ask("Account ID: ")).trim()
  const accessKeyId = (await ask("Access Key ID: ")).trim()
  const secretAccessKey = (await askSecret("Secret Access Key: ")).trim()
  const bucketName = (await ask("Bucket name: ")).trim()
  const region = (await ask("Region (press enter for auto): ")).trim()

  if (!accountId || !accessKeyId || !secretAccessKey || !bucketName) {
    console.log("\nError: All fields except Region are required.")
    process.exitCode = 1
    return
  }

  saveGlobalConfig(
    toR2Url({ accountId, accessKeyId, secretAccessKey, bucketName, region: region || undefined }),
  )
  console.log(`\nSaved to ${getConfigPath()}`)
}

const status = Effect.gen(function* () {
  const configPath = getConfigPath()
  yield* Console.log("=== r2-operator status ===\n")
  yield* Console.log(`Config file: ${configPath}`)
  yield* Console.log(`Exists: ${existsSync(configPath) ? "yes" : "no"}\n`)

  const builder = yield* loadBuilder()
  const config = yield* builder.toConfig()
  yield* Console.log("Configuration:")
  yield* Console.log(`  Bucket: ${config.bucketName}`)
  yield* Console.log(`  Endpoint: ${config.endpoint}`)
  yield* Console.log(`  Region: ${config.region}`)
  yield* Console.log(`  Access Key: ${config.accessKeyId.slice(0, 8)}...`)
}).pipe(
  Effect.catchTag("MissingField", (error) =>
    Console.log(`Incomplete configuration: ${error.message}\nRun 'npm run cli -- init' to set up.`),
  ),
)

const storage = (command: StorageCommand) =>
  loadBuilder().pipe(
    Effect.flatMap((builder) => runStorageCommand(command).pipe(Effect.provide(builder.layer()))),
    Effect.provide(NodeFileSystem.layer),
  )

const command = parseCommand(process.argv.slice(2))

if (isStorageCommand(command)) {
  NodeRuntime.runMain(storage(command))
} else if (command._tag === "Status") {
  NodeRuntime.runMain(status)
} else if (command._tag === "Init") {
  init().catch((e) => {
    console.error(e)
    process.exit(1)
  })
} else {
  console.log(usage)
}
