import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogMessage = string | { message: string; [key: string]: string | object }

export const isLoggingEnabled = (): boolean =>
  process.env.ADDRESS_BOOK_LOG_ENABLED === 'true'

// stdout belongs to the conversation, so diagnostics go to stderr
export const log = (message: LogMessage) => {
  if (!isLoggingEnabled()) {
    return
  }

  let logMessage: {
    message: string
    app: string
    version: string
    [key: string]: string | object
  }
  if (typeof message === 'string') {
    logMessage = {
      message,
      app: name,
      version,
    }
  } else {
    logMessage = {
      ...message,
      app: name,
      version,
    }
  }
  console.error(logMessage)
}
