import type { ChatEvent } from '../events/ChatEvent.js';
import type { NotificationSink } from '../messaging/MessageSender.js';
import type { LivenessSource } from '../presence/LiveRoomClient.js';
import type { SegmentStore } from '../storage/SegmentStore.js';
import type { GroupConfig } from '../../infra/config/config.js';
import type { DatabaseLogSink } from '../../infra/logger/LogSink.js';
import type { Uploader } from '../../infra/upload/ScriptUploader.js';

/**
 * Handles commands reach through this instead of ambient globals.
 */
export interface CommandServices {
  store: Pick<SegmentStore, 'exportRecentCsv'>;
  logSink: Pick<DatabaseLogSink, 'exportRecentCsv'>;
  uploader: Uploader;
  liveRooms: LivenessSource;
  exportDir: string;
  /** Group config of the event's group, if configured */
  group?: GroupConfig;
  /** Removes a local export once uploaded */
  removeFile(path: string): Promise<void>;
  now(): Date;
  /** Short random tag that keeps same-second exports apart */
  uniqueSuffix(): string;
}

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  /** The original chat event */
  event: ChatEvent;

  /** Command arguments (split by whitespace) */
  args: string[];

  /** Reply channel */
  sender: NotificationSink;

  services: CommandServices;
}

/**
 * Interface for command handlers
 */
export interface CommandHandler {
  /** Primary command name (e.g., "history") */
  name: string;

  /** Alternative names */
  aliases?: string[];

  /** Description for help text */
  description?: string;

  /** Only the group's configured admins may run it */
  adminOnly?: boolean;

  /** Execute the command */
  run(ctx: CommandContext): Promise<void>;
}
