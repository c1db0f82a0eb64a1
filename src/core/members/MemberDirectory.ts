import { z } from 'zod';
import type { AppConfig } from '../../infra/config/config.js';
import { findGroup } from '../../infra/config/config.js';
import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../errors.js';
import type { OneBotCaller } from '../messaging/MessageSender.js';

export interface MemberNameHint {
  card?: string;
  nickname?: string;
}

export interface MemberNameResolver {
  /** Best-effort display name; never rejects. */
  resolveName(groupId: number, userId: number, hint?: MemberNameHint): Promise<string>;
}

const MemberInfoSchema = z.object({
  nickname: z.string().default(''),
  card: z.string().default(''),
});

/**
 * Resolves display names in descending priority:
 * configured known member → group card → global nickname → the user id itself.
 * Card and nickname come from the event hint when present, else from get_group_member_info.
 */
export class MemberDirectory implements MemberNameResolver {
  constructor(
    private readonly config: Pick<AppConfig, 'groups'>,
    private readonly api: OneBotCaller,
    private readonly logger: Logger,
  ) {}

  async resolveName(groupId: number, userId: number, hint?: MemberNameHint): Promise<string> {
    const known = findGroup(this.config, groupId)?.knownMembers[String(userId)];
    if (known) return known;
    // Names carried by the event itself save an API round trip
    const hinted = [hint?.card, hint?.nickname].find((name) => !!name);
    if (hinted) return hinted;

    let data: unknown;
    try {
      data = await this.api.call('get_group_member_info', {
        group_id: groupId,
        user_id: userId,
        no_cache: false,
      });
    } catch (error) {
      this.logger.error('members', `GroupMemberInfo api request failed: ${errorMessage(error)}`);
      return String(userId);
    }

    const info = MemberInfoSchema.safeParse(data);
    if (!info.success) {
      this.logger.error(
        'members',
        `GroupMemberInfo deserialize failed: ${info.error.message}\nData: ${JSON.stringify(data)}`,
      );
      return String(userId);
    }
    return [info.data.card, info.data.nickname].find((name) => name.length > 0) ?? String(userId);
  }
}
