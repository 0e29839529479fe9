import { createInterface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import type { AddressBook } from '../contacts/address-book.ts'
import { handleLine } from './dispatcher.ts'
import type { AssistantContext } from './handlers.ts'

export const WELCOME = 'Welcome to the assistant bot!'
export const PROMPT = 'Enter a command: '

export interface SessionOptions {
  input: Readable
  output: Writable
  context: AssistantContext
  /** Called once when the session ends, by command or end of input */
  save: (book: AddressBook) => Promise<void>
}

/**
 * Reads commands line by line until close/exit or end of input, writing each
 * reply to output, then saves the book.
 */
export const runSession = async ({
  input,
  output,
  context,
  save,
}: SessionOptions): Promise<void> => {
  const lines = createInterface({ input, crlfDelay: Infinity, terminal: false })

  output.write(`${WELCOME}\n${PROMPT}`)

  try {
    for await (const line of lines) {
      const { reply, exit } = handleLine(line, context)
      output.write(`${reply}\n`)
      if (exit) {
        break
      }
      output.write(PROMPT)
    }
  } finally {
    lines.close()
  }

  await save(context.book)
}
