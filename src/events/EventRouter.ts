// MARK: - Event Router
// Capability-based subscriptions of bot extensions to gateway events

import { Client } from 'discord.js';
import type { ClientEvents } from 'discord.js';
import { describeError } from '../errors';
import { logger } from '../utils/logger';

export type EventHandler<K extends keyof ClientEvents> = (...args: ClientEvents[K]) => Promise<void>;

/**
 * A feature module. It declares what it consumes by subscribing during register.
 */
export interface BotExtension {
  readonly name: string;
  register(router: EventRouter): void;
}

export interface Subscription {
  extension: string;
  event: keyof ClientEvents;
}

export class EventRouter {
  private readonly subscriptions: Subscription[] = [];
  private readonly extensions = new Set<string>();

  constructor(private readonly client: Client) {}

  use(extension: BotExtension): void {
    if (this.extensions.has(extension.name)) {
      throw new Error(`Extension already registered: ${extension.name}`);
    }

    this.extensions.add(extension.name);
    extension.register(this);

    logger.info('Extension registered', {
      extension: extension.name,
      events: this.subscriptions.filter(sub => sub.extension === extension.name).map(sub => sub.event),
    });
  }

  /**
   * Each subscription gets its own listener; a failing handler never
   * affects other subscribers of the same event.
   */
  on<K extends keyof ClientEvents>(event: K, extension: string, handler: EventHandler<K>): void {
    this.client.on(event, (...args: ClientEvents[K]) => {
      handler(...args).catch((error: unknown) => {
        logger.error('Extension handler failed', {
          extension,
          event,
          ...describeError(error),
        });
      });
    });

    this.subscriptions.push({ extension, event });
  }

  getSubscriptions(): Subscription[] {
    return [...this.subscriptions];
  }
}
