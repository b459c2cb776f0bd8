import { beforeEach, describe, expect, it } from 'vitest';
import { JournalOnboardingExtension } from '../../src/extensions/JournalOnboardingExtension';
import { InMemoryJournalStore } from '../helpers/InMemoryJournalStore';
import { FakeJournalChannels } from '../helpers/FakeJournalChannels';
import { GUILD_ID } from '../helpers/fixtures';

const AUTHOR = { id: 'user-1', username: 'Anna Smith' };

describe('JournalOnboardingExtension', () => {
  let store: InMemoryJournalStore;
  let channels: FakeJournalChannels;
  let onboarding: JournalOnboardingExtension;

  beforeEach(() => {
    store = new InMemoryJournalStore();
    channels = new FakeJournalChannels();
    onboarding = new JournalOnboardingExtension(channels, store, {
      guildId: GUILD_ID,
      journalChannelPrefix: 'journal-',
      dailyWordRequirement: 500,
    });
  });

  async function storedChannelId(): Promise<string | null> {
    const user = await store.getUser(GUILD_ID, AUTHOR.id);
    return user?.journalChannelId ?? null;
  }

  describe('ensureJournalChannel', () => {
    it('creates and records a channel for a new member', async () => {
      const { channel, created } = await onboarding.ensureJournalChannel(AUTHOR);

      expect(created).toBe(true);
      expect(channel.id).toBe('chan-1');
      expect(channels.created.map(entry => entry.name)).toEqual(['journal-anna-smith']);
      expect(await storedChannelId()).toBe('chan-1');
    });

    it('reuses the recorded channel', async () => {
      await onboarding.ensureJournalChannel(AUTHOR);

      const again = await onboarding.ensureJournalChannel(AUTHOR);

      expect(again.created).toBe(false);
      expect(again.channel.id).toBe('chan-1');
      expect(channels.created).toHaveLength(1);
    });

    it('replaces a recorded channel that was deleted', async () => {
      await onboarding.ensureJournalChannel(AUTHOR);
      channels.remove('chan-1');

      const { channel, created } = await onboarding.ensureJournalChannel(AUTHOR);

      expect(created).toBe(true);
      expect(channel.id).toBe('chan-2');
      expect(await storedChannelId()).toBe('chan-2');
    });

    it('keeps the channel another instance recorded first', async () => {
      let theirs = '';
      channels.afterCreate = async () => {
        theirs = channels.add('journal-anna-smith').id;
        await store.setJournalChannel(GUILD_ID, AUTHOR.id, theirs);
      };

      const { channel, created } = await onboarding.ensureJournalChannel(AUTHOR);

      expect(theirs).toBe('chan-2');
      expect(created).toBe(false);
      expect(channel.id).toBe('chan-2');
      expect(channels.created[0].deletedWith).toBe('Duplicate journal channel');
      expect(channels.channels.has('chan-1')).toBe(false);
      expect(await storedChannelId()).toBe('chan-2');
    });

    it('records its own channel when the concurrently recorded one is unreachable', async () => {
      channels.afterCreate = async () => {
        await store.setJournalChannel(GUILD_ID, AUTHOR.id, 'chan-gone');
      };

      const { channel, created } = await onboarding.ensureJournalChannel(AUTHOR);

      expect(created).toBe(true);
      expect(channel.id).toBe('chan-1');
      expect(channels.created[0].deletedWith).toBeNull();
      expect(await storedChannelId()).toBe('chan-1');

      const again = await onboarding.ensureJournalChannel(AUTHOR);
      expect(again).toMatchObject({ created: false, channel: { id: 'chan-1' } });
      expect(channels.created).toHaveLength(1);
    });

    it('deletes its channel and fails when the member record cannot be updated', async () => {
      channels.afterCreate = async () => {
        store.users.clear();
      };

      await expect(onboarding.ensureJournalChannel(AUTHOR)).rejects.toThrow(
        'Journal channel for user-1 could not be recorded',
      );
      expect(channels.created[0].deletedWith).toBe('Journal channel could not be recorded');
      expect(channels.channels.size).toBe(0);
    });
  });
});
