// Guild channel directory kept in memory; channels can vanish or be created concurrently

import type { JournalAuthor, JournalChannel, JournalChannelDirectory } from '../../src/extensions/JournalChannelDirectory';

export class FakeJournalChannel implements JournalChannel {
  readonly sent: string[] = [];
  deletedWith: string | null = null;

  constructor(
    readonly id: string,
    readonly name: string,
    private readonly directory: FakeJournalChannels,
  ) {}

  async send(content: string): Promise<void> {
    this.sent.push(content);
  }

  async delete(reason?: string): Promise<void> {
    this.deletedWith = reason ?? '';
    this.directory.remove(this.id);
  }
}

export class FakeJournalChannels implements JournalChannelDirectory {
  readonly channels = new Map<string, FakeJournalChannel>();
  readonly created: FakeJournalChannel[] = [];
  /** Runs once after the next create, before the caller sees the channel */
  afterCreate: (() => Promise<void>) | null = null;
  private sequence = 0;

  async fetch(channelId: string): Promise<JournalChannel | null> {
    return this.channels.get(channelId) ?? null;
  }

  async create(name: string, _author: JournalAuthor): Promise<FakeJournalChannel> {
    const channel = this.add(name);
    this.created.push(channel);

    if (this.afterCreate) {
      const hook = this.afterCreate;
      this.afterCreate = null;
      await hook();
    }
    return channel;
  }

  /** Adds a channel that was created outside this directory's create */
  add(name: string): FakeJournalChannel {
    this.sequence++;
    const channel = new FakeJournalChannel(`chan-${this.sequence}`, name, this);
    this.channels.set(channel.id, channel);
    return channel;
  }

  remove(channelId: string): void {
    this.channels.delete(channelId);
  }
}
