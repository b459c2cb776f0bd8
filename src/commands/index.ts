// MARK: - Commands Index
// Export command builders and handlers

import { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import type { BotConfig } from '../config';
import type { AccessController } from '../services/access/AccessController';
import type { DailyResetScheduler } from '../services/access/DailyResetScheduler';
import type { InsightService } from '../services/InsightService';
import type { JournalStore } from '../services/journal/JournalStore';

import * as insight from './insight';
import * as progress from './progress';
import * as adminAccess from './adminAccess';
import * as help from './help';

export interface CommandContext {
  config: BotConfig;
  store: JournalStore;
  controller: AccessController;
  scheduler: DailyResetScheduler;
  insight: InsightService | null;
}

export type CommandHandler = (interaction: ChatInputCommandInteraction, context: CommandContext) => Promise<void>;

// Export commands array for deployment
export const commands: RESTPostAPIChatInputApplicationCommandsJSONBody[] = [
  insight.data.toJSON(),
  progress.data.toJSON(),
  adminAccess.data.toJSON(),
  help.data.toJSON(),
];

// Export handlers map for execution
export const handlers = new Map<string, CommandHandler>([
  ['insight', insight.execute],
  ['progress', progress.execute],
  ['admin-access', adminAccess.execute],
  ['help', help.execute],
]);

export const adminCommands = new Set<string>(['admin-access']);

export function getCommandNames(): string[] {
  return Array.from(handlers.keys());
}
