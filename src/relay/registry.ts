import { NO_USERS_ONLINE } from '../protocol/messages.js'

export interface RegistryEntry<T> {
  identity: string
  member: T
}

/**
 * Identity directory shared by every connection handler.
 *
 * All operations are synchronous, so each one runs to completion on the event
 * loop before any other handler can observe the map: the check-and-insert in
 * tryRegister() cannot interleave with another claim, and no caller can hold
 * the map across a socket write. Lookups may be stale as soon as they return;
 * a failed send to a looked-up member means the member has gone.
 */
export class Registry<T> {
  private members: Map<string, T> = new Map()

  tryRegister(identity: string, member: T): boolean {
    if (this.members.has(identity)) return false
    this.members.set(identity, member)
    return true
  }

  /**
   * Removes the identity if present. With `member`, only removes the entry
   * when it still belongs to that member.
   */
  deregister(identity: string, member?: T): boolean {
    const current = this.members.get(identity)
    if (current === undefined) return false
    if (member !== undefined && current !== member) return false
    return this.members.delete(identity)
  }

  lookup(identity: string): T | undefined {
    return this.members.get(identity)
  }

  has(identity: string): boolean {
    return this.members.has(identity)
  }

  listIdentities(): string[] {
    if (this.members.size === 0) return [NO_USERS_ONLINE]
    return Array.from(this.members.keys()).sort()
  }

  snapshot(): RegistryEntry<T>[] {
    return Array.from(this.members, ([identity, member]) => ({ identity, member }))
  }

  get size(): number {
    return this.members.size
  }
}
