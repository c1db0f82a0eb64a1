import type { MemberNameHint } from '../members/MemberDirectory.js';
import type { MessagePart } from '../model/Segment.js';

/**
 * Platform-agnostic inbound group message.
 * Adapters normalize their events to this format.
 */
export interface ChatEvent {
  /** Platform identifier */
  platform: 'qq';

  /** Group id; also the segment table key */
  channelId: number;

  /** Platform message id (recall notices refer to it) */
  messageId: number;

  senderId: number;

  /** Optional: sender's group card and nickname as carried by the event */
  senderHint?: MemberNameHint;

  /** Unix timestamp (seconds) */
  timestamp: number;

  /** Ordered message parts, before decomposition */
  parts: MessagePart[];

  /** Concatenated text parts, for command parsing */
  rawText: string;

  /** Bot account that received the event */
  selfId: number;
}
