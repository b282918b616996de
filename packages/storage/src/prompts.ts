import { createInterface } from "node:readline"
import { Writable } from "node:stream"

export interface Prompter {
  ask: (question: string) => Promise<string>
  /** Like ask, but typed characters are not echoed */
  askSecret: (question: string) => Promise<string>
  close: () => void
}

/**
 * One readline interface for a whole dialogue, so answers piped in ahead of
 * the questions are buffered rather than dropped. An exhausted input answers "".
 */
export const makePrompter = (
  input: NodeJS.ReadableStream & { isTTY?: boolean },
  output: NodeJS.WritableStream,
): Prompter => {
  let muted = false
  const echo = new Writable({
    write(chunk, _encoding, callback) {
      if (!muted) output.write(chunk)
      callback()
    },
  })

  const rl = createInterface({ input, output: echo, terminal: input.isTTY === true })
  const lines = rl[Symbol.asyncIterator]()
  let closed = false
  rl.on("close", () => {
    closed = true
  })
  rl.on("SIGINT", () => rl.close())

  const ask = async (question: string) => {
    if (closed) {
      output.write(question)
    } else {
      rl.setPrompt(question)
      rl.prompt()
    }
    const next = await lines.next()
    return next.done ? "" : next.value
  }

  return {
    ask,
    askSecret: async (question) => {
      const answer = ask(question)
      muted = true
      try {
        return await answer
      } finally {
        muted = false
        output.write("\n")
      }
    },
    close: () => rl.close(),
  }
}
