import { ProtocolError } from '../errors.js'
import { isValidIdentity } from '../identity.js'
import { formatFileSize } from '../utils.js'
import { MAX_TEXT_PAYLOAD } from './frame.js'
import type { RelayCommand } from './types.js'

// Room for the longest wrapper a relayed message gets
// ("[PRIVATE] <identity> -> You: "), so every notice fits one TEXT frame.
export const MAX_MESSAGE_BYTES = MAX_TEXT_PAYLOAD - 64
export const MAX_FILENAME_BYTES = 255

export const NO_USERS_ONLINE = 'No users online'
export const SHUTDOWN_NOTICE = 'Server shutting down'
export const MESSAGE_TOO_LONG = `ERROR: Message too long (max ${MAX_MESSAGE_BYTES} bytes)`
export const FILENAME_TOO_LONG = `ERROR: Filename too long (max ${MAX_FILENAME_BYTES} bytes)`

export const INVALID_USERNAME = 'ERROR: Invalid username. Use only alphanumeric, _, and -'
export const INVALID_DIRECT_FORMAT = 'ERROR: Invalid format. Use: @username message'
export const SENDFILE_USAGE = 'Usage: /sendfile <username> <filename> <file_size>'
export const INVALID_FILE_SIZE = 'ERROR: Invalid file size (max 10MB)'
export const NO_PENDING_OFFER = 'ERROR: No pending file offer'
export const SELF_TRANSFER = 'ERROR: Cannot send a file to yourself'

export const notices = {
  welcome: (identity: string) =>
    `Welcome ${identity}! Type /list, /quit, @user msg, /sendfile user file size`,
  usernameTaken: (identity: string) => `ERROR: Username '${identity}' is already taken`,
  joined: (identity: string) => `${identity} joined the chat!`,
  left: (identity: string) => `${identity} left the chat`,
  goodbye: (identity: string) => `Goodbye ${identity}!`,
  activeUsers,
  broadcast: (from: string, text: string) => `${from}: ${text}`,
  privateIn: (from: string, text: string) => `[PRIVATE] ${from} -> You: ${text}`,
  privateOut: (to: string, text: string) => `[PRIVATE] You -> ${to}: ${text}`,
  userNotFound: (identity: string) => `ERROR: User '${identity}' not found or offline`,
  userOffline: (identity: string) => `ERROR: User '${identity}' is not online`,
  fileOffer: (id: string, from: string, filename: string, size: number) =>
    `/file_offer ${id} from ${from} (${filename}, ${formatFileSize(size)}) - Accept? (y/n)`,
  awaitingAnswer: (to: string, filename: string) => `[FILE] Waiting for ${to} to accept ${filename}...`,
  fileReady: (id: string) => `/file_ready ${id}`,
  fileData: (id: string, from: string, filename: string, size: number) =>
    `/file_data ${id} ${from} ${filename} ${size}`,
  declined: (to: string, filename: string) => `[FILE] ${to} declined ${filename}`,
  noAnswer: (to: string) => `ERROR: ${to} did not answer the file offer`,
  offerExpired: (id: string, from: string) => `[FILE] Offer ${id} from ${from} expired`,
  queued: (to: string, filename: string) => `[FILE] ${to} is receiving another file, ${filename} is queued`,
  transferComplete: (id: string) => `[FILE] ✓ Transfer ${id} complete!`,
  transferFailed: (id: string) => `ERROR: File transfer ${id} failed`
}

const ACTIVE_USERS_PREFIX = 'Active users: '

// Drops names from the end until the reply fits one TEXT frame.
function activeUsers(identities: string[]): string {
  let text = ACTIVE_USERS_PREFIX + identities.join(', ')
  let shown = identities.length
  while (Buffer.byteLength(text, 'utf8') > MAX_TEXT_PAYLOAD && shown > 0) {
    shown--
    text = `${ACTIVE_USERS_PREFIX}${identities.slice(0, shown).join(', ')} (+${identities.length - shown} more)`
  }
  return text
}

function checkMessage(text: string): string {
  if (Buffer.byteLength(text, 'utf8') > MAX_MESSAGE_BYTES) throw new ProtocolError(MESSAGE_TOO_LONG)
  return text
}

/**
 * Classifies one trimmed command line. Returns null for blank input and
 * throws a ProtocolError carrying the reply text for malformed commands.
 * Size bounds are checked by the file relay, not here.
 */
export function parseCommand(line: string): RelayCommand | null {
  const trimmed = line.trim()
  if (!trimmed) return null

  if (trimmed === '/list') return { type: 'list' }
  if (trimmed === '/quit') return { type: 'quit' }

  if (trimmed.startsWith('@')) {
    const space = trimmed.indexOf(' ')
    if (space === -1) throw new ProtocolError(INVALID_DIRECT_FORMAT)
    const target = trimmed.slice(1, space)
    const text = trimmed.slice(space + 1).trim()
    if (!target || !text) throw new ProtocolError(INVALID_DIRECT_FORMAT)
    if (!isValidIdentity(target)) throw new ProtocolError(INVALID_USERNAME)
    return { type: 'direct', target, text: checkMessage(text) }
  }

  const parts = trimmed.split(/\s+/)
  const verb = parts[0]

  if (verb === '/sendfile') {
    const [, target, filename, sizeField] = parts
    if (parts.length !== 4 || !target || !filename || !sizeField) {
      throw new ProtocolError(SENDFILE_USAGE)
    }
    if (!isValidIdentity(target)) throw new ProtocolError(INVALID_USERNAME)
    if (Buffer.byteLength(filename, 'utf8') > MAX_FILENAME_BYTES) throw new ProtocolError(FILENAME_TOO_LONG)
    if (!/^\d+$/.test(sizeField)) throw new ProtocolError(INVALID_FILE_SIZE)
    return { type: 'sendfile', target, filename, size: Number(sizeField) }
  }

  if (verb === '/accept_file' || verb === '/reject_file') {
    if (parts.length > 2) throw new ProtocolError(`Usage: ${verb} [transfer-id]`)
    return { type: 'respond', accept: verb === '/accept_file', transferId: parts[1] ?? null }
  }

  return { type: 'broadcast', text: checkMessage(trimmed) }
}

export interface FileOfferNotice {
  id: string
  from: string
  filename: string
  sizeLabel: string
}

export interface FileDataNotice {
  id: string
  from: string
  filename: string
  size: number
}

const FILE_OFFER_PATTERN = /^\/file_offer (\S+) from (\S+) \((\S+), ([^)]+)\) - Accept\? \(y\/n\)$/
const FILE_DATA_PATTERN = /^\/file_data (\S+) (\S+) (\S+) (\d+)$/
const FILE_READY_PATTERN = /^\/file_ready (\S+)$/
const TRANSFER_COMPLETE_PATTERN = /^\[FILE\] ✓ Transfer (\S+) complete!$/
const TRANSFER_FAILED_PATTERN = /^ERROR: File transfer (\S+) failed$/
const MORE_USERS_PATTERN = / \(\+\d+ more\)$/

export interface TransferOutcome {
  id: string
  complete: boolean
}

export function parseFileOffer(text: string): FileOfferNotice | null {
  const match = text.match(FILE_OFFER_PATTERN)
  if (!match) return null
  const [, id, from, filename, sizeLabel] = match
  if (!id || !from || !filename || !sizeLabel) return null
  return { id, from, filename, sizeLabel }
}

export function parseFileData(text: string): FileDataNotice | null {
  const match = text.match(FILE_DATA_PATTERN)
  if (!match) return null
  const [, id, from, filename, size] = match
  if (!id || !from || !filename || !size) return null
  return { id, from, filename, size: Number(size) }
}

export function parseFileReady(text: string): string | null {
  const match = text.match(FILE_READY_PATTERN)
  return match?.[1] ?? null
}

export function parseTransferOutcome(text: string): TransferOutcome | null {
  const complete = text.match(TRANSFER_COMPLETE_PATTERN)?.[1]
  if (complete) return { id: complete, complete: true }
  const failed = text.match(TRANSFER_FAILED_PATTERN)?.[1]
  if (failed) return { id: failed, complete: false }
  return null
}

/** Identities listed in an `Active users:` reply, without any `(+N more)` tail. */
export function parseActiveUsers(text: string): string[] | null {
  if (!text.startsWith(ACTIVE_USERS_PREFIX)) return null
  return text.slice(ACTIVE_USERS_PREFIX.length).replace(MORE_USERS_PATTERN, '').split(', ')
}
