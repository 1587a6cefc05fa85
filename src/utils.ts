import crypto from 'hypercore-crypto'
import b4a from 'b4a'

export function generateId(): string {
  return b4a.toString(crypto.randomBytes(16), 'hex')
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

// Local time, millisecond precision: 2024-01-05 09:03:07.042
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}.${pad(date.getMilliseconds(), 3)}`
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
