export type RelayErrorKind = 'protocol' | 'auth' | 'routing' | 'transfer' | 'transport'

/**
 * Base class for every failure the relay reports. The message is the exact
 * notice text sent to the affected connection, so handlers can forward it
 * without reformatting.
 */
export class RelayError extends Error {
  readonly kind: RelayErrorKind

  constructor(kind: RelayErrorKind, message: string) {
    super(message)
    this.name = new.target.name
    this.kind = kind
  }
}

/** Malformed command, bad arity or non-numeric field. Connection stays Active. */
export class ProtocolError extends RelayError {
  constructor(message: string) {
    super('protocol', message)
  }
}

/** Invalid or duplicate identity. Reported once, then the connection closes. */
export class AuthError extends RelayError {
  constructor(message: string) {
    super('auth', message)
  }
}

/** Target identity not found. Reported to the sender only. */
export class RoutingError extends RelayError {
  constructor(message: string) {
    super('routing', message)
  }
}

export class TransferError extends RelayError {
  constructor(message: string) {
    super('transfer', message)
  }
}

/** Read or write failure on a transport. Never retried. */
export class TransportError extends RelayError {
  constructor(message: string) {
    super('transport', message)
  }
}
