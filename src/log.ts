import fs from 'node:fs'
import path from 'node:path'
import { formatTimestamp, errorMessage } from './utils.js'

/** Operational event sink. Receives the event text and the time it happened. */
export type EventSink = (event: string, at: Date) => void

export interface EventLogOptions {
  logFile?: string | null
  console?: boolean
}

export function formatEvent(event: string, at: Date): string {
  return `[${formatTimestamp(at)}] ${event}`
}

export function createEventLog(options: EventLogOptions = {}): EventSink {
  const logFile = options.logFile ?? null
  const toConsole = options.console ?? true
  let fileFailed = false

  if (logFile) {
    const dir = path.dirname(logFile)
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true })
    }
  }

  return (event, at) => {
    const line = formatEvent(event, at)
    if (toConsole) console.log(line)
    if (!logFile || fileFailed) return

    try {
      fs.appendFileSync(logFile, line + '\n')
    } catch (err) {
      // Report once; the console copy keeps flowing.
      fileFailed = true
      console.error(`Failed to write log file ${logFile}: ${errorMessage(err)}`)
    }
  }
}

export const silentLog: EventSink = () => {}

export function logNow(sink: EventSink, event: string): void {
  sink(event, new Date())
}
