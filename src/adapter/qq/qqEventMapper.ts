import { z } from 'zod';
import type { ChatEvent } from '../../core/events/ChatEvent.js';
import { partFromOneBot } from '../../core/segment/SegmentCodec.js';

/**
 * OneBot11 frame classification:
 * https://github.com/botuniverse/onebot-11
 * Group messages become ChatEvents, notices are handed over raw, API responses
 * are matched by `echo`, everything else is ignored.
 */
export type InboundFrame =
  | { type: 'message'; event: ChatEvent }
  | { type: 'notice'; raw: unknown; selfId?: number }
  | { type: 'response'; raw: unknown }
  | { type: 'ignored'; reason: string };

// OneBot11 group message schema
const OB11MessageSchema = z.object({
  post_type: z.literal('message'),
  message_type: z.enum(['group', 'private']),
  message: z.array(
    z.object({
      type: z.string(),
      data: z.record(z.unknown()).default({}),
    }),
  ),
  user_id: z.number(),
  group_id: z.number().optional(),
  message_id: z.number(),
  time: z.number(),
  self_id: z.number().optional(),
  sender: z
    .object({
      user_id: z.number().optional(),
      nickname: z.string().optional(),
      card: z.string().optional(),
    })
    .optional(),
});

const FrameHeadSchema = z.object({
  post_type: z.string().optional(),
  echo: z.unknown().optional(),
  self_id: z.number().optional(),
});

/**
 * Map a OneBot11 group message to a ChatEvent.
 * Returns null for private messages, malformed frames and the bot's own messages.
 */
export function mapToChatEvent(
  raw: unknown,
  logger?: { debug: (tag: string, msg: string) => void },
): ChatEvent | null {
  const parsed = OB11MessageSchema.safeParse(raw);
  if (!parsed.success) {
    logger?.debug('qq-mapper', `Unrecognised message frame: ${parsed.error.issues[0]?.message}`);
    return null;
  }

  const msg = parsed.data;
  if (msg.message_type !== 'group' || msg.group_id === undefined) {
    return null;
  }

  // Drop messages sent by the bot itself to avoid self-trigger loops
  if (msg.self_id && msg.user_id === msg.self_id) {
    logger?.debug('qq-mapper', `Filtered self message from bot ${msg.self_id}`);
    return null;
  }

  const rawText = msg.message
    .map((seg) => (seg.type === 'text' && typeof seg.data.text === 'string' ? seg.data.text : ''))
    .join('');

  return {
    platform: 'qq',
    channelId: msg.group_id,
    messageId: msg.message_id,
    senderId: msg.user_id,
    senderHint: msg.sender ? { card: msg.sender.card, nickname: msg.sender.nickname } : undefined,
    timestamp: msg.time,
    parts: msg.message.map(partFromOneBot),
    rawText,
    selfId: msg.self_id ?? 0,
  };
}

export function classifyFrame(
  raw: unknown,
  logger?: { debug: (tag: string, msg: string) => void },
): InboundFrame {
  const head = FrameHeadSchema.safeParse(raw);
  if (!head.success) {
    return { type: 'ignored', reason: 'not an object frame' };
  }
  if (head.data.echo !== undefined && head.data.post_type === undefined) {
    return { type: 'response', raw };
  }
  switch (head.data.post_type) {
    case 'message': {
      const event = mapToChatEvent(raw, logger);
      return event ? { type: 'message', event } : { type: 'ignored', reason: 'not a group message' };
    }
    case 'notice':
      return { type: 'notice', raw, selfId: head.data.self_id };
    default:
      return { type: 'ignored', reason: `post_type ${head.data.post_type ?? 'missing'}` };
  }
}
