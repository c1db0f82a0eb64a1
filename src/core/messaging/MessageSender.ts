/**
 * Outbound seams to the chat platform.
 * The QQ adapter implements these; the core only sees the interfaces.
 */

/**
 * Where presence transitions and command replies are delivered.
 * Resolves once the platform accepted the message; rejects on delivery failure.
 */
export interface NotificationSink {
  notify(channelId: number, text: string, imageUrl?: string): Promise<void>;
}

/** Platform send that reports the id the platform assigned to the new message. */
export interface GroupMessageSender {
  sendGroupMessage(channelId: number, text: string, imageUrl?: string): Promise<number | null>;
}

/**
 * Request/response call into the OneBot HTTP-style API carried over the WebSocket.
 * Resolves with the response `data` field.
 */
export interface OneBotCaller {
  call(action: string, params: Record<string, unknown>): Promise<unknown>;
}
