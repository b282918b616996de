import { Console, Effect, Layer } from "effect"
import { NodeRuntime } from "@effect/platform-node"
import { R2Operator, loadBuilder } from "r2-operator"

const program = Effect.gen(function* () {
  yield* Console.log("=== r2-operator playground ===\n")

  const r2 = yield* R2Operator
  yield* Console.log(`Bucket: ${r2.bucketName}\n`)

  // Upload bytes
  yield* Console.log("Uploading playground/hello.txt...")
  yield* r2.uploadBinary(
    "playground/hello.txt",
    "text/plain",
    new TextEncoder().encode("Hello from playground!"),
  )

  // Read it back
  const bytes = yield* r2.download("playground/hello.txt")
  yield* Console.log(`Content: "${new TextDecoder().decode(bytes)}"`)

  const meta = yield* r2.head("playground/hello.txt")
  yield* Console.log(`Size: ${meta.size} bytes, Cache-Control: ${meta.cacheControl}`)

  // List objects
  yield* Console.log("\nListing (first page)...")
  for (const key of yield* r2.listObjects()) {
    yield* Console.log(`  - ${key}`)
  }

  // Cleanup
  yield* Console.log("\nCleaning up...")
  yield* r2.delete("playground/hello.txt")
  const stillThere = yield* r2.exists("playground/hello.txt")
  yield* Console.log(stillThere ? "Delete did not take effect" : "Done!")
})

program.pipe(
  Effect.provide(Layer.unwrapEffect(loadBuilder().pipe(Effect.map((builder) => builder.layer())))),
  Effect.catchAll((error) => Console.log(`Error: ${error._tag} - ${error.message}`)),
  NodeRuntime.runMain,
)
