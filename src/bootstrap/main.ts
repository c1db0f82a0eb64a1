import { randomUUID } from 'node:crypto';
import { rm } from 'node:fs/promises';
import { loadConfig, findGroup, type AppConfig } from '../infra/config/config.js';
import { createLogger } from '../infra/logger/logger.js';
import { DatabaseLogSink, createPersistentLogger } from '../infra/logger/LogSink.js';
import { openDatabase, type SqliteDatabase } from '../infra/storage/database.js';
import { ScriptUploader, localUploader, type Uploader } from '../infra/upload/ScriptUploader.js';
import { MainRouter } from '../core/router/MainRouter.js';
import { CommandRouter } from '../core/command/CommandRouter.js';
import { builtinCommands } from '../core/command/builtin/index.js';
import { SegmentStore } from '../core/storage/SegmentStore.js';
import { SegmentCodec } from '../core/segment/SegmentCodec.js';
import { GroupMessageRecorder } from '../core/segment/GroupMessageRecorder.js';
import { MemberDirectory } from '../core/members/MemberDirectory.js';
import { BotIdentity, GroupMessenger } from '../core/messaging/GroupMessenger.js';
import { RecallReconciler } from '../core/notice/RecallReconciler.js';
import { NoticeDispatcher } from '../core/notice/NoticeDispatcher.js';
import { LiveRoomClient } from '../core/presence/LiveRoomClient.js';
import { PresenceWatcher, type WatchedRoom } from '../core/presence/PresenceWatcher.js';
import { OneBotApi } from '../adapter/qq/OneBotApi.js';
import { QQMessageSender } from '../adapter/qq/QQMessageSender.js';
import { QQAdapter } from '../adapter/qq/QQAdapter.js';

export interface RunningBot {
  stop(): Promise<void>;
}

export function watchedRooms(cfg: Pick<AppConfig, 'groups'>): WatchedRoom[] {
  return cfg.groups.flatMap((group) =>
    group.live ? [{ channelId: group.id, ...group.live }] : [],
  );
}

export async function start(cfg: AppConfig = loadConfig()): Promise<RunningBot> {
  const consoleLogger = createLogger(cfg);

  let db: SqliteDatabase;
  try {
    db = openDatabase(cfg.database.path, consoleLogger);
  } catch (error) {
    consoleLogger.error('bootstrap', `Open database ${cfg.database.path} failed`);
    throw error;
  }

  const logSink = new DatabaseLogSink(db, consoleLogger, {
    tableName: cfg.database.logTableName,
    utcOffsetHours: cfg.database.utcOffsetHours,
  });
  logSink.initialize();
  const logger = createPersistentLogger(consoleLogger, logSink, cfg.logging.persistLevel);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env}`);

  const store = new SegmentStore(db, logger, cfg.database.groupTablePrefix);
  const api = new OneBotApi(logger, cfg.adapters.qq.apiTimeoutMs);
  const members = new MemberDirectory(cfg, api, logger);
  const uploader: Uploader = cfg.objectStorage
    ? new ScriptUploader(cfg.objectStorage.scriptPath, logger)
    : localUploader;
  if (!cfg.objectStorage) {
    logger.warn('bootstrap', 'Object storage not configured - media and exports stay local');
  }

  const recorder = new GroupMessageRecorder(
    new SegmentCodec(logger),
    store,
    members,
    api,
    uploader,
    logger,
    cfg.database.utcOffsetHours,
  );
  const identity = new BotIdentity();
  const messenger = new GroupMessenger(new QQMessageSender(api, logger), recorder, identity, logger);

  const liveRooms = new LiveRoomClient(logger, {
    baseUrl: cfg.liveApi.baseUrl,
    timeoutMs: cfg.liveApi.timeoutMs,
  });
  const commandRouter = new CommandRouter(messenger, logger, builtinCommands(), (event) => ({
    store,
    logSink,
    uploader,
    liveRooms,
    exportDir: cfg.storage.exportDir,
    group: findGroup(cfg, event.channelId),
    removeFile: (path) => rm(path, { force: true }),
    now: () => new Date(),
    uniqueSuffix: () => randomUUID().slice(0, 8),
  }));

  const notices = new NoticeDispatcher(
    new RecallReconciler(store, members, logger, cfg.database.utcOffsetHours),
    members,
    messenger,
    logger,
  );
  const router = new MainRouter(logger, recorder, commandRouter, notices, identity);

  let qqAdapter: QQAdapter | null = null;
  if (cfg.adapters.qq.enabled) {
    logger.info('bootstrap', 'Starting QQ adapter...');
    qqAdapter = new QQAdapter(router, api, logger, {
      wsPort: cfg.adapters.qq.wsPort,
      token: cfg.adapters.qq.token,
    });
    qqAdapter.start();
  } else {
    logger.warn('bootstrap', 'QQ adapter disabled (missing token or config)');
  }

  const watcher = new PresenceWatcher(watchedRooms(cfg), liveRooms, messenger, logger);
  watcher.start();

  return {
    async stop() {
      logger.info('bootstrap', 'Shutting down');
      watcher.stop();
      await qqAdapter?.stop();
      await watcher.settled();
      db.close();
    },
  };
}
