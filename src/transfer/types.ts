import type { Connection } from '../relay/connection.js'

export const MAX_FILE_SIZE = 10 * 1024 * 1024

export type TransferState = 'Offered' | 'Accepted' | 'Rejected' | 'Streaming' | 'Complete' | 'Failed'

export interface Transfer {
  id: string
  sender: Connection     // borrowed for the transfer's lifetime
  recipient: Connection
  filename: string       // display only, never resolved against the server's disk
  size: number
  state: TransferState
  bytesMoved: number
  failureReason: string | null
  createdAt: number
  updatedAt: number
}

export interface TransferRequest {
  sender: Connection
  recipient: string  // identity
  filename: string
  size: number
}

export type OfferAnswer = 'accepted' | 'rejected' | 'timeout' | 'recipient-gone' | 'sender-gone'
