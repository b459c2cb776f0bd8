// MARK: - Main Bot Entry Point
// Discord bot initialization and event handling

import 'dotenv/config';
import { Client, Events, GatewayIntentBits, MessageFlags, Partials, REST, Routes } from 'discord.js';
import mongoose from 'mongoose';
import { loadConfig } from './config';
import type { BotConfig } from './config';
import { ConfigInvalidError, describeError, toError } from './errors';
import { errorNotifier } from './services/ErrorNotifier';
import { MongoJournalStore } from './services/journal/MongoJournalStore';
import { JournalCalendar } from './services/journal/JournalCalendar';
import { DiscordChannelAccess } from './services/access/ChannelAccess';
import { AccessController } from './services/access/AccessController';
import { DailyResetScheduler } from './services/access/DailyResetScheduler';
import { InsightService } from './services/InsightService';
import { OpenAIService } from './services/OpenAIService';
import { EventRouter } from './events/EventRouter';
import { JournalingExtension } from './extensions/JournalingExtension';
import { JournalOnboardingExtension } from './extensions/JournalOnboardingExtension';
import { DiscordJournalChannels } from './extensions/JournalChannelDirectory';
import { initializeHealthServer, startHealthServer, stopHealthServer } from './health';
import { adminCommands, commands, handlers } from './commands';
import type { CommandContext } from './commands';
import { logger } from './utils/logger';

// MARK: - Configuration
function readConfig(): BotConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigInvalidError) {
      logger.error('Invalid configuration', { problems: error.problems });
    } else {
      logger.error('Failed to load configuration', { error: describeError(error).message });
    }
    process.exit(1);
  }
}

const config = readConfig();

// MARK: - Discord Client Setup
const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.DirectMessages,
    GatewayIntentBits.MessageContent, // PRIVILEGED INTENT
  ],
  partials: [Partials.Channel],
});

// MARK: - Services
const store = new MongoJournalStore();
const calendar = new JournalCalendar(config.timezone, config.resetTime);

const controller = new AccessController(
  {
    store,
    channelAccess: new DiscordChannelAccess(client, config.sharedChannelId),
    calendar,
    alerts: errorNotifier,
  },
  {
    threshold: config.dailyWordRequirement,
    accessRetry: config.accessRetry,
  },
);

const scheduler = new DailyResetScheduler(store, controller, calendar, errorNotifier, {
  guildId: config.guildId,
  reconcileCron: config.reconcileCron,
});

const insight = config.openai.apiKey
  ? new InsightService(store, new OpenAIService(config.openai.apiKey, config.openai.model), calendar)
  : null;

const commandContext: CommandContext = { config, store, controller, scheduler, insight };

const router = new EventRouter(client);
router.use(new JournalingExtension(controller, errorNotifier, {
  guildId: config.guildId,
  sharedChannelId: config.sharedChannelId,
  journalChannelPrefix: config.journalChannelPrefix,
}));
router.use(new JournalOnboardingExtension(new DiscordJournalChannels(client, config.guildId), store, {
  guildId: config.guildId,
  journalChannelPrefix: config.journalChannelPrefix,
  dailyWordRequirement: config.dailyWordRequirement,
}));

// MARK: - MongoDB Connection
async function connectMongoDB(): Promise<void> {
  const maxRetries = 5;
  let retries = 0;

  while (retries < maxRetries) {
    try {
      await mongoose.connect(config.mongodbUri, {
        maxPoolSize: 10,
        minPoolSize: 2,
        serverSelectionTimeoutMS: 5000,
      });
      logger.info('MongoDB connected successfully');
      return;
    } catch (error) {
      retries++;
      logger.error(`MongoDB connection attempt ${retries} failed`, {
        error: describeError(error).message,
        retries,
        maxRetries,
      });

      if (retries >= maxRetries) {
        throw new Error('Failed to connect to MongoDB after maximum retries');
      }

      // Exponential backoff
      const delay = Math.min(1000 * Math.pow(2, retries), 10000);
      logger.info(`Retrying MongoDB connection in ${delay}ms...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

// MongoDB connection events
mongoose.connection.on('connected', () => {
  logger.info('Mongoose connected to MongoDB');
});

mongoose.connection.on('error', (error: Error) => {
  logger.error('Mongoose connection error', { error: error.message });
});

mongoose.connection.on('disconnected', () => {
  logger.warn('Mongoose disconnected from MongoDB');
});

// MARK: - Event: Client Ready
client.once(Events.ClientReady, async (readyClient) => {
  logger.info(`Bot logged in as: ${readyClient.user.tag}`);
  logger.info(`Guilds: ${readyClient.guilds.cache.size}`);
  logger.info(`Extensions: ${router.getSubscriptions().map(sub => sub.extension).join(', ')}`);

  try {
    errorNotifier.initialize(client, config.operatorChannelId);
    logger.info('✓ ErrorNotifier initialized');

    await scheduler.initialize();
    logger.info('✓ DailyResetScheduler initialized');

    // Register guild commands
    logger.info('Registering slash commands...');
    const rest = new REST({ version: '10' }).setToken(config.discordToken);

    await rest.put(
      Routes.applicationGuildCommands(config.discordClientId, config.guildId),
      { body: commands }
    );
    logger.info(`✓ Registered ${commands.length} slash commands`);

    // Start health server
    initializeHealthServer({ client, guildId: config.guildId, store, controller, scheduler });
    await startHealthServer(config.port, !process.env.PORT);
    logger.info('✓ Health server started');

    logger.info('Bot ready and operational', {
      threshold: config.dailyWordRequirement,
      timezone: config.timezone,
      resetCron: calendar.cronExpression(),
    });
  } catch (error) {
    const failure = toError(error);
    logger.error('Failed to initialize bot services', {
      error: failure.message,
      stack: failure.stack,
    });
    await errorNotifier.notifyCritical(config.guildId, failure, {
      context: 'Bot initialization failed',
    });
    process.exit(1);
  }
});

// MARK: - Event: Interaction Create
client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  const commandName = interaction.commandName;
  const handler = handlers.get(commandName);

  if (!handler) {
    logger.warn('Unknown command', { commandName });
    await interaction.reply({
      content: '❌ Unknown command.',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  // Check permissions for admin commands
  if (adminCommands.has(commandName)) {
    const isOwnerOverride = config.ownerIds.includes(interaction.user.id);
    if (!isOwnerOverride && !interaction.memberPermissions?.has('Administrator')) {
      await interaction.reply({
        content: '❌ You need Administrator permissions to use this command.',
        flags: MessageFlags.Ephemeral,
      });
      return;
    }
  }

  try {
    logger.info('Command executed', {
      commandName,
      userId: interaction.user.id,
      guildId: interaction.guildId,
    });

    await handler(interaction, commandContext);
  } catch (error) {
    const failure = toError(error);
    logger.error('Command execution failed', {
      commandName,
      userId: interaction.user.id,
      error: failure.message,
      stack: failure.stack,
    });

    const errorMessage = '❌ An error occurred while executing this command. The team has been notified.';

    if (interaction.deferred) {
      await interaction.editReply(errorMessage);
    } else if (interaction.replied) {
      await interaction.followUp({
        content: errorMessage,
        flags: MessageFlags.Ephemeral,
      });
    } else {
      await interaction.reply({
        content: errorMessage,
        flags: MessageFlags.Ephemeral,
      });
    }

    await errorNotifier.notify(config.guildId, failure, {
      context: `Command: ${commandName}`,
      userId: interaction.user.id,
    });
  }
});

// MARK: - Graceful Shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    // Stop cron jobs
    scheduler.shutdown();
    logger.info('✓ Daily reset scheduler stopped');

    // Destroy Discord client
    await client.destroy();
    logger.info('✓ Discord client destroyed');

    // Close MongoDB connection
    await mongoose.connection.close();
    logger.info('✓ MongoDB connection closed');

    // Stop health server
    await stopHealthServer();
    logger.info('✓ Health server stopped');

    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    const failure = toError(error);
    logger.error('Error during shutdown', {
      error: failure.message,
      stack: failure.stack,
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

// MARK: - Uncaught Exception Handler
process.on('uncaughtException', async (error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });

  await errorNotifier.notifyCritical(config.guildId, error, {
    context: 'uncaughtException',
  });

  process.exit(1);
});

process.on('unhandledRejection', async (reason: unknown) => {
  const failure = toError(reason);
  logger.error('Unhandled promise rejection', {
    reason: failure.message,
    stack: failure.stack,
  });

  await errorNotifier.notifyCritical(config.guildId, failure, {
    context: 'unhandledRejection',
  });

  process.exit(1);
});

// MARK: - Start Bot
async function start(): Promise<void> {
  try {
    logger.info('Starting journal gate bot...');

    // Connect to MongoDB first
    await connectMongoDB();

    // Then login to Discord
    await client.login(config.discordToken);
  } catch (error) {
    const failure = toError(error);
    logger.error('Failed to start bot', {
      error: failure.message,
      stack: failure.stack,
    });
    process.exit(1);
  }
}

// Start the bot
void start();
