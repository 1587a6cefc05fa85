export const MAX_IDENTITY_LENGTH = 20

const IDENTITY_PATTERN = /^[A-Za-z0-9_-]+$/

export function validateIdentity(identity: string): string | null {
  if (!identity) return 'Identity is required'
  if (identity.length > MAX_IDENTITY_LENGTH) {
    return `Identity must be ${MAX_IDENTITY_LENGTH} characters or less`
  }
  if (!IDENTITY_PATTERN.test(identity)) {
    return 'Identity can only contain letters, numbers, underscores, and hyphens'
  }
  return null
}

export function isValidIdentity(identity: string): boolean {
  return validateIdentity(identity) === null
}
