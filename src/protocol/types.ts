export interface TextFrame {
  kind: 'text'
  text: string
}

export interface DataFrame {
  kind: 'data'
  data: Buffer  // raw file bytes; empty marks the sender's end of stream
}

export type Frame = TextFrame | DataFrame

export type RelayCommand =
  | { type: 'list' }
  | { type: 'direct'; target: string; text: string }
  | { type: 'sendfile'; target: string; filename: string; size: number }
  | { type: 'respond'; accept: boolean; transferId: string | null }
  | { type: 'quit' }
  | { type: 'broadcast'; text: string }
