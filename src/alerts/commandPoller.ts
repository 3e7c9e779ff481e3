import type { CommandQueue } from '../strategies/gridCycle/commands';
import { logger } from '../utils/logger';
import { formatError } from '../utils/formatError';
import { ParseOptions, parseCommand } from './commandParser';
import type { TelegramUpdate } from './telegram';

export interface UpdateSource {
  getUpdates(offset: number, timeoutSec?: number): Promise<TelegramUpdate[]>;
  sendMessage(msg: string, chatId?: string): Promise<void>;
}

export interface CommandPollerOptions {
  /** only messages from this chat are obeyed */
  chatId: string;
  intervalMs: number;
  parseOptions: () => ParseOptions;
}

/**
 * Turns chat messages into queued engine commands. The poller never touches
 * engine state; the controller drains the queue on its next tick.
 */
export class CommandPoller {
  private offset = 0;
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;

  constructor(
    private readonly source: UpdateSource,
    private readonly queue: CommandQueue,
    private readonly options: CommandPollerOptions
  ) {}

  async pollOnce(): Promise<number> {
    let updates: TelegramUpdate[];
    try {
      updates = await this.source.getUpdates(this.offset);
    } catch (error) {
      logger.warn('command_poll_failed', { event: 'command_poll_failed', error: formatError(error) });
      return 0;
    }

    let queued = 0;
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);
      const message = update.message;
      if (!message?.text) continue;
      if (String(message.chat.id) !== this.options.chatId) {
        logger.warn('command_from_unknown_chat', {
          event: 'command_from_unknown_chat',
          chatId: String(message.chat.id),
        });
        continue;
      }
      const result = parseCommand(message.text, this.options.parseOptions());
      if (result.kind === 'command') {
        this.queue.push(result.command);
        queued += 1;
        logger.info('command_queued', { event: 'command_queued', command: result.command.type });
      } else if (result.kind === 'reply') {
        await this.source.sendMessage(result.text, this.options.chatId);
      }
    }
    return queued;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.inFlight) return;
      this.inFlight = true;
      void this.pollOnce()
        .catch((error) => {
          logger.error('command_poll_crashed', { event: 'command_poll_crashed', error: formatError(error) });
        })
        .finally(() => {
          this.inFlight = false;
        });
    }, this.options.intervalMs);
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
