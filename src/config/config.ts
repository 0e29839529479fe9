import path from 'node:path'
import { DEFAULT_BIRTHDAY_WINDOW_DAYS } from '../contacts/address-book.ts'
import { log } from '../plumbing/logger.ts'
import { parseInteger } from '../plumbing/parse-number.ts'
import { ConfigError } from './errors.ts'
import type { AssistantConfig } from './types/assistant-config.ts'

export const DEFAULT_DATA_FILE = 'addressbook.json'
export const MAX_BIRTHDAY_WINDOW_DAYS = 366

let cachedConfig: AssistantConfig | null = null

const validateConfig = (config: AssistantConfig): void => {
  const errors: string[] = []

  if (path.basename(config.dataFile) === '') {
    errors.push('ADDRESS_BOOK_FILE must name a file')
  }

  if (
    config.birthdayWindowDays < 1 ||
    config.birthdayWindowDays > MAX_BIRTHDAY_WINDOW_DAYS
  ) {
    errors.push(
      `ADDRESS_BOOK_BIRTHDAY_WINDOW_DAYS must be between 1 and ${MAX_BIRTHDAY_WINDOW_DAYS}`,
    )
  }

  if (errors.length > 0) {
    throw new ConfigError(errors)
  }
}

export const getAssistantConfig = (): AssistantConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const fileEnv = process.env.ADDRESS_BOOK_FILE?.trim()
  const dataFile = path.resolve(
    fileEnv && fileEnv.length > 0 ? fileEnv : DEFAULT_DATA_FILE,
  )

  const config: AssistantConfig = {
    dataFile,
    birthdayWindowDays: parseInteger(
      process.env.ADDRESS_BOOK_BIRTHDAY_WINDOW_DAYS,
      DEFAULT_BIRTHDAY_WINDOW_DAYS,
    ),
  }

  validateConfig(config)
  cachedConfig = config

  log({ message: 'Assistant configuration loaded', dataFile })

  return config
}

export const clearConfigCache = (): void => {
  cachedConfig = null
}
