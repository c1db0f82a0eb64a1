import { describeLiveRoom, liveRoomImage, liveRoomUrl } from '../../presence/LiveRoomClient.js';
import type { CommandHandler } from '../types.js';

/**
 * Live command - query a live room, defaulting to the one this group watches
 */
export const LiveCommand: CommandHandler = {
  name: 'live',
  aliases: ['查询直播间'],
  description: '查询直播间状态：/live [房间号]',

  async run({ event, args, sender, services }) {
    const roomId = args[0] ?? services.group?.live?.roomId;
    if (!roomId || !/^\d+$/.test(roomId)) {
      await sender.notify(event.channelId, '直播间不存在');
      return;
    }

    const room = await services.liveRooms.query(roomId);
    if (!room.exists || !room.metadata) {
      await sender.notify(event.channelId, `直播间${roomId}不存在`);
      return;
    }

    const status = room.isLive ? '直播中' : '不在直播';
    const text = [status, `链接:${liveRoomUrl(roomId)}`, describeLiveRoom(room.metadata)].join('\n');
    await sender.notify(event.channelId, text, liveRoomImage(room.metadata));
  },
};
