import type { ChatEvent } from '../events/ChatEvent.js';
import type { NotificationSink } from '../messaging/MessageSender.js';
import type { CommandHandler, CommandServices } from './types.js';
import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../errors.js';

export interface ParsedCommand {
  name: string;
  args: string[];
}

/**
 * Routes command messages to appropriate handlers
 */
export class CommandRouter {
  private commandMap: Map<string, CommandHandler> = new Map();

  constructor(
    private sender: NotificationSink,
    private logger: Logger,
    commands: CommandHandler[],
    private services: (event: ChatEvent) => CommandServices,
  ) {
    // Register all commands and their aliases
    for (const cmd of commands) {
      this.commandMap.set(cmd.name.toLowerCase(), cmd);
      for (const alias of cmd.aliases ?? []) {
        this.commandMap.set(alias.toLowerCase(), cmd);
      }
    }

    this.logger.info('command-router', `Registered ${commands.length} commands`);
  }

  isRegistered(name: string): boolean {
    return this.commandMap.has(name.toLowerCase());
  }

  /**
   * "/history 20" → { name: "history", args: ["20"] }. Only registered commands parse.
   */
  tryParse(rawText: string): ParsedCommand | null {
    const text = rawText.trim();
    if (!text) return null;

    const first = text[0];
    if (first !== '/' && first !== '!' && first !== '！') return null;

    const body = text.slice(1).trim();
    if (!body) return null;

    const [head, ...args] = body.split(/\s+/);
    const name = head.toLowerCase();
    if (!this.isRegistered(name)) return null;
    return { name, args };
  }

  /**
   * Handle a chat event. Returns false when the text is not a registered command.
   */
  async handle(event: ChatEvent): Promise<boolean> {
    const parsed = this.tryParse(event.rawText);
    if (!parsed) return false;

    const handler = this.commandMap.get(parsed.name);
    if (!handler) return false;

    const services = this.services(event);
    if (handler.adminOnly && !services.group?.command?.adminIds.includes(event.senderId)) {
      this.logger.info(
        'command-router',
        `Ignore /${parsed.name} from non-admin ${event.senderId} in ${event.channelId}`,
      );
      return true;
    }

    try {
      this.logger.info(
        'command-router',
        `Executing command: /${handler.name} (args: ${parsed.args.length}, from ${event.senderId})`,
      );
      await handler.run({ event, args: parsed.args, sender: this.sender, services });
      this.logger.debug('command-router', `Command /${handler.name} completed`);
    } catch (error) {
      this.logger.error('command-router', `Command ${handler.name} failed: ${errorMessage(error)}`);
      try {
        await this.sender.notify(event.channelId, `指令执行失败：${handler.name}`);
      } catch (sendError) {
        this.logger.error('command-router', `Failure reply not delivered: ${errorMessage(sendError)}`);
      }
    }
    return true;
  }
}
