import * as fs from 'fs'
import * as path from 'path'

// Empty CHAT_LOG_FILE disables file output (tests set it that way)
function logFile(): string | null {
  const configured = process.env.CHAT_LOG_FILE
  if (configured === '') return null
  return configured ?? path.join(process.cwd(), 'app.log')
}

function getTimestamp(): string {
  return new Date().toISOString()
}

function append(line: string): void {
  const file = logFile()
  if (!file) return
  fs.appendFileSync(file, `[${getTimestamp()}] ${line}\n`)
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.stack ?? error.message
  return String(error)
}

export function log(message: string): void {
  console.log(message)
  append(message)
}

export function logWarn(message: string): void {
  console.warn(message)
  append(`WARN: ${message}`)
}

export function logDebug(message: string): void {
  if (!process.env.CHAT_DEBUG) return
  console.debug(message)
  append(`DEBUG: ${message}`)
}

export function logError(message: string, error?: unknown): void {
  const errorMessage = error !== undefined ? `${message}: ${describe(error)}` : message
  console.error(errorMessage)
  append(`ERROR: ${errorMessage}`)
}
