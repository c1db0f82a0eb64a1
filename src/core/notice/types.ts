import { z } from 'zod';

/**
 * OneBot 11 group notices, parsed into a closed union keyed by `kind`.
 * Adding a kind here makes every exhaustive `switch` over GroupNotice fail to compile
 * until it is handled.
 */

const base = {
  time: z.number().int(),
  self_id: z.number().int(),
};

const GroupUploadSchema = z
  .object({ ...base, notice_type: z.literal('group_upload'), group_id: z.number().int(), user_id: z.number().int() })
  .transform((n) => ({
    kind: 'upload' as const,
    selfId: n.self_id,
    time: n.time,
    channelId: n.group_id,
    userId: n.user_id,
  }));

const GroupAdminSchema = z
  .object({
    ...base,
    notice_type: z.literal('group_admin'),
    sub_type: z.enum(['set', 'unset']),
    group_id: z.number().int(),
    user_id: z.number().int(),
  })
  .transform((n) => ({
    kind: 'admin' as const,
    selfId: n.self_id,
    time: n.time,
    channelId: n.group_id,
    userId: n.user_id,
    change: n.sub_type,
  }));

const GroupDecreaseSchema = z
  .object({
    ...base,
    notice_type: z.literal('group_decrease'),
    sub_type: z.enum(['leave', 'kick', 'kick_me']),
    group_id: z.number().int(),
    operator_id: z.number().int(),
    user_id: z.number().int(),
  })
  .transform((n) => ({
    kind: 'member_decrease' as const,
    selfId: n.self_id,
    time: n.time,
    channelId: n.group_id,
    userId: n.user_id,
    operatorId: n.operator_id,
    reason: n.sub_type,
  }));

const GroupIncreaseSchema = z
  .object({
    ...base,
    notice_type: z.literal('group_increase'),
    sub_type: z.enum(['approve', 'invite']),
    group_id: z.number().int(),
    operator_id: z.number().int(),
    user_id: z.number().int(),
  })
  .transform((n) => ({
    kind: 'member_increase' as const,
    selfId: n.self_id,
    time: n.time,
    channelId: n.group_id,
    userId: n.user_id,
    operatorId: n.operator_id,
    reason: n.sub_type,
  }));

const GroupBanSchema = z
  .object({
    ...base,
    notice_type: z.literal('group_ban'),
    sub_type: z.enum(['ban', 'lift_ban']),
    group_id: z.number().int(),
    operator_id: z.number().int(),
    user_id: z.number().int(),
    duration: z.number().int(),
  })
  .transform((n) => ({
    kind: 'ban' as const,
    selfId: n.self_id,
    time: n.time,
    channelId: n.group_id,
    userId: n.user_id,
    operatorId: n.operator_id,
    action: n.sub_type,
    durationSec: n.duration,
  }));

const FriendAddSchema = z
  .object({ ...base, notice_type: z.literal('friend_add'), user_id: z.number().int() })
  .transform((n) => ({
    kind: 'friend_add' as const,
    selfId: n.self_id,
    time: n.time,
    userId: n.user_id,
  }));

const GroupRecallSchema = z
  .object({
    ...base,
    notice_type: z.literal('group_recall'),
    group_id: z.number().int(),
    user_id: z.number().int(),
    operator_id: z.number().int(),
    message_id: z.number().int(),
  })
  .transform((n) => ({
    kind: 'recall' as const,
    selfId: n.self_id,
    timestamp: n.time,
    channelId: n.group_id,
    messageId: n.message_id,
    retractorId: n.operator_id,
    retractedUserId: n.user_id,
  }));

const PokeSchema = z
  .object({
    ...base,
    notice_type: z.literal('notify'),
    sub_type: z.literal('poke'),
    group_id: z.number().int(),
    user_id: z.number().int(),
    target_id: z.number().int(),
  })
  .transform((n) => ({
    kind: 'poke' as const,
    selfId: n.self_id,
    time: n.time,
    channelId: n.group_id,
    userId: n.user_id,
    targetId: n.target_id,
  }));

const HonorSchema = z
  .object({
    ...base,
    notice_type: z.literal('notify'),
    sub_type: z.literal('honor'),
    group_id: z.number().int(),
    user_id: z.number().int(),
    honor_type: z.enum(['talkative', 'performer', 'emotion']),
  })
  .transform((n) => ({
    kind: 'honor' as const,
    selfId: n.self_id,
    time: n.time,
    channelId: n.group_id,
    userId: n.user_id,
    honor: n.honor_type,
  }));

export const GroupNoticeSchema = z.union([
  GroupUploadSchema,
  GroupAdminSchema,
  GroupDecreaseSchema,
  GroupIncreaseSchema,
  GroupBanSchema,
  FriendAddSchema,
  GroupRecallSchema,
  PokeSchema,
  HonorSchema,
]);

export type GroupNotice = z.output<typeof GroupNoticeSchema>;
export type RecallNotice = Extract<GroupNotice, { kind: 'recall' }>;

export type ParseNoticeResult =
  | { ok: true; notice: GroupNotice }
  | { ok: false; error: string };

export function parseNotice(raw: unknown): ParseNoticeResult {
  const parsed = GroupNoticeSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => i.message).join('; ') };
  }
  return { ok: true, notice: parsed.data };
}
