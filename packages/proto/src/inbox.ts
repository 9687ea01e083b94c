import type { DataMessage } from './types'

export const DEFAULT_INBOX_CAPACITY = 8
const PREVIEW_BYTES = 16

/**
 * Hex rendering of the first bytes of a payload, for logs.
 */
export const previewPayload = (data: Buffer): string => {
  const hex = data.subarray(0, PREVIEW_BYTES).toString('hex')
  return data.length > PREVIEW_BYTES ? `${hex}...` : hex
}

/**
 * Bounded list of accepted DataMessages, newest first. Older messages are
 * dropped once `capacity` is reached.
 */
export class MessageInbox {
  private readonly messages: DataMessage[] = []

  public constructor(public readonly capacity: number = DEFAULT_INBOX_CAPACITY) {}

  public accept(message: DataMessage): void {
    this.messages.unshift(message)
    if (this.messages.length > this.capacity) {
      this.messages.length = this.capacity
    }
  }

  public list(): readonly DataMessage[] {
    return [...this.messages]
  }
}
