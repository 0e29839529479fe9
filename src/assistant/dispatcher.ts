import {
  addBirthday,
  addContact,
  type AssistantContext,
  type CommandHandler,
  changeContact,
  deleteContact,
  HELP_TEXT,
  removePhone,
  showAll,
  showBirthday,
  showPhone,
  upcomingBirthdays,
} from './handlers.ts'
import { withInputErrors } from './input-errors.ts'
import { parseInput } from './parse-input.ts'

export interface CommandResult {
  reply: string
  /** True once the user asked to close the session */
  exit: boolean
}

const EXIT_COMMANDS = new Set(['close', 'exit'])

const bookCommands: Record<string, CommandHandler> = {
  add: addContact,
  change: changeContact,
  phone: showPhone,
  'remove-phone': removePhone,
  delete: deleteContact,
  all: showAll,
  'add-birthday': addBirthday,
  'show-birthday': showBirthday,
  birthdays: upcomingBirthdays,
}

const guardedCommands = new Map<string, CommandHandler>()
for (const [command, handler] of Object.entries(bookCommands)) {
  guardedCommands.set(command, withInputErrors(command, handler))
}

export const handleLine = (
  line: string,
  context: AssistantContext,
): CommandResult => {
  const { command, args } = parseInput(line)

  if (command === '') {
    return { reply: 'Enter a command.', exit: false }
  }
  if (EXIT_COMMANDS.has(command)) {
    return { reply: 'Good bye!', exit: true }
  }
  if (command === 'hello') {
    return { reply: 'Hello! How can I assist you?', exit: false }
  }
  if (command === 'help') {
    return { reply: HELP_TEXT, exit: false }
  }

  const handler = guardedCommands.get(command)
  if (!handler) {
    return {
      reply: "Invalid command. Type 'help' to see available commands.",
      exit: false,
    }
  }

  return { reply: handler(args, context), exit: false }
}
