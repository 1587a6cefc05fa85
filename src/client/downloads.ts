import fs from 'node:fs'
import path from 'node:path'

const SAFE_EXTENSION = /^\.[A-Za-z0-9_-]{1,16}$/

export interface SavedFile {
  path: string
  bytes: number
}

/** Returns `name`, or `base-N.ext` for the first N that does not exist in `dir`. */
export function uniqueFileName(dir: string, name: string): string {
  if (!fs.existsSync(path.join(dir, name))) return name

  const dotIdx = name.lastIndexOf('.')
  const base = dotIdx > 0 ? name.slice(0, dotIdx) : name
  const ext = dotIdx > 0 ? name.slice(dotIdx) : ''

  let counter = 1
  let candidate = `${base}-${counter}${ext}`
  while (fs.existsSync(path.join(dir, candidate))) {
    counter++
    candidate = `${base}-${counter}${ext}`
  }
  return candidate
}

// The offered filename is only trusted for its extension.
export function downloadName(sender: string, filename: string, at: Date): string {
  const ext = path.extname(path.basename(filename))
  const seconds = Math.floor(at.getTime() / 1000)
  return `from_${sender}_${seconds}${SAFE_EXTENSION.test(ext) ? ext : ''}`
}

/**
 * Writes a received file to `<downloadDir>/<identity>/from_<sender>_<unix-seconds><ext>`.
 */
export function saveReceivedFile(
  downloadDir: string,
  identity: string,
  sender: string,
  filename: string,
  data: Uint8Array,
  at: Date = new Date()
): SavedFile {
  const dir = path.join(downloadDir, identity)
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true })
  }

  const name = uniqueFileName(dir, downloadName(sender, filename, at))
  const filePath = path.join(dir, name)
  fs.writeFileSync(filePath, data)
  return { path: filePath, bytes: data.byteLength }
}
