/**
 * Persists every inbound group message as one row per segment.
 *
 * Flow: ChatEvent → SegmentCodec → interpretation → SegmentStore.insert (fan-out)
 */

import { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import { storeTimeFromUnix } from '../../infra/time/storeTime.js';
import type { Uploader } from '../../infra/upload/ScriptUploader.js';
import { errorMessage } from '../errors.js';
import type { ChatEvent } from '../events/ChatEvent.js';
import type { MemberNameResolver } from '../members/MemberDirectory.js';
import type { OneBotCaller } from '../messaging/MessageSender.js';
import type { DecodedSegment, Segment } from '../model/Segment.js';
import type { SegmentStore } from '../storage/SegmentStore.js';
import type { SegmentCodec } from './SegmentCodec.js';

const FileResponseSchema = z.object({ file: z.string() });

export interface RecordResult {
  attempted: number;
  inserted: number;
}

export class GroupMessageRecorder {
  constructor(
    private readonly codec: SegmentCodec,
    private readonly store: Pick<SegmentStore, 'insert'>,
    private readonly members: MemberNameResolver,
    private readonly api: OneBotCaller,
    private readonly uploader: Uploader,
    private readonly logger: Logger,
    private readonly utcOffsetHours: number,
  ) {}

  async record(event: ChatEvent): Promise<RecordResult> {
    const timestamp = storeTimeFromUnix(event.timestamp, this.utcOffsetHours);
    if (timestamp === null) {
      this.logger.error('recorder', `Message ${event.messageId} has invalid time ${event.timestamp}`);
      return { attempted: 0, inserted: 0 };
    }
    const senderName = await this.members.resolveName(
      event.channelId,
      event.senderId,
      event.senderHint,
    );
    const decoded = this.codec.decompose(event.parts);

    let inserted = 0;
    for (const part of decoded) {
      const { content, interpretation } = await this.interpret(event.channelId, part);
      const segment: Segment = {
        messageId: event.messageId,
        timestamp,
        senderId: event.senderId,
        senderName,
        kind: part.kind,
        content,
        interpretation,
      };
      try {
        await this.store.insert(event.channelId, segment);
        inserted++;
      } catch (error) {
        this.logger.error('recorder', `Write group message failed: ${errorMessage(error)}`);
      }
    }
    this.logger.debug(
      'recorder',
      `Recorded message ${event.messageId} in ${event.channelId}: ${inserted}/${decoded.length} segments`,
    );
    return { attempted: decoded.length, inserted };
  }

  private async interpret(
    channelId: number,
    segment: DecodedSegment,
  ): Promise<{ content: string; interpretation: string }> {
    const content = segment.content;
    switch (segment.kind) {
      case 'text':
        return { content, interpretation: 'text' };
      case 'share':
        return { content, interpretation: 'url' };
      case 'video':
        return { content, interpretation: 'not supported' };
      case 'reply':
        return { content, interpretation: 'message_id' };
      case 'at':
        return {
          content,
          interpretation: await this.members.resolveName(channelId, Number(content)),
        };
      case 'image':
        return this.fetchMedia('get_image', { file: content }, content);
      case 'record':
        return this.fetchMedia('get_record', { file: content, out_format: 'mp3' }, content);
      case 'contact':
      case 'forward':
      case 'node':
        return { content, interpretation: '' };
    }
  }

  /**
   * Ask the platform to materialise a media file, then upload it when it is a local path.
   * Any failure keeps the original file reference with an empty interpretation.
   */
  private async fetchMedia(
    action: 'get_image' | 'get_record',
    params: Record<string, unknown>,
    fileRef: string,
  ): Promise<{ content: string; interpretation: string }> {
    let data: unknown;
    try {
      data = await this.api.call(action, params);
    } catch (error) {
      this.logger.warn('recorder', `${action} failed for ${fileRef}: ${errorMessage(error)}`);
      return { content: fileRef, interpretation: '' };
    }
    const parsed = FileResponseSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn('recorder', `${action} returned no file for ${fileRef}`);
      return { content: fileRef, interpretation: '' };
    }
    const path = parsed.data.file;
    if (!path.startsWith('/')) {
      return { content: path, interpretation: '' };
    }
    return { content: path, interpretation: await this.uploader.upload(path) };
  }
}
