import { AccessController } from '../../src/services/access/AccessController';
import type { JournalMessage } from '../../src/services/access/AccessController';
import { JournalCalendar } from '../../src/services/journal/JournalCalendar';
import { FakeChannelAccess, RecordingAlerts } from './FakeChannelAccess';
import { InMemoryJournalStore } from './InMemoryJournalStore';

export const GUILD_ID = 'guild-1';
export const THRESHOLD = 500;

export function words(count: number): string {
  return Array.from({ length: count }, () => 'word').join(' ');
}

export function journalMessage(
  messageId: string,
  content: string,
  overrides: Partial<JournalMessage> = {},
): JournalMessage {
  return {
    guildId: GUILD_ID,
    discordId: 'user-1',
    displayName: 'Anna',
    channelId: 'journal-channel-1',
    messageId,
    content,
    createdAt: new Date('2024-05-01T12:00:00Z'),
    ...overrides,
  };
}

export interface Harness {
  store: InMemoryJournalStore;
  access: FakeChannelAccess;
  alerts: RecordingAlerts;
  calendar: JournalCalendar;
  controller: AccessController;
  clock: { now: Date };
}

/**
 * Controller over in-process fakes, UTC midnight reset, no retry delays
 */
export function createHarness(start = new Date('2024-05-01T12:00:00Z')): Harness {
  const store = new InMemoryJournalStore();
  const access = new FakeChannelAccess();
  const alerts = new RecordingAlerts();
  const calendar = new JournalCalendar('UTC');
  const clock = { now: start };

  const controller = new AccessController(
    { store, channelAccess: access, calendar, alerts },
    {
      threshold: THRESHOLD,
      accessRetry: { attempts: 3, baseDelayMs: 0, timeoutMs: 1000 },
      storeRetry: { attempts: 3, baseDelayMs: 0 },
      now: () => clock.now,
    },
  );

  return { store, access, alerts, calendar, controller, clock };
}
