#!/usr/bin/env node
import 'dotenv/config'
import { runSession } from './assistant/session.ts'
import { getAssistantConfig } from './config/config.ts'
import { todayCalendarDate } from './contacts/calendar-date.ts'
import { log } from './plumbing/logger.ts'
import { loadAddressBook, saveAddressBook } from './storage/storage.ts'

const main = async (): Promise<void> => {
  const config = getAssistantConfig()
  const book = await loadAddressBook(config.dataFile)

  await runSession({
    input: process.stdin,
    output: process.stdout,
    context: {
      book,
      today: () => todayCalendarDate(),
      birthdayWindowDays: config.birthdayWindowDays,
    },
    save: (finalBook) => saveAddressBook(finalBook, config.dataFile),
  })

  log('Session finished')
}

main().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error)
  process.exit(1)
})
