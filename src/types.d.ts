declare module 'hypercore-crypto' {
  export function randomBytes(n: number): Buffer
}

declare module 'b4a' {
  export function toString(buf: Uint8Array, encoding?: string, start?: number, end?: number): string
  export function from(data: string | Uint8Array, encoding?: string): Buffer
  export function alloc(size: number, fill?: number | string): Buffer
  export function allocUnsafe(size: number): Buffer
  export function concat(buffers: Uint8Array[], totalLength?: number): Buffer
  export function equals(a: Uint8Array, b: Uint8Array): boolean
  export function isBuffer(obj: unknown): obj is Buffer
}
