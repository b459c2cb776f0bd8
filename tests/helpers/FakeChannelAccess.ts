// Records shared channel calls; failures and side effects are scripted per test

import type { ChannelAccessGateway } from '../../src/services/access/ChannelAccess';

export interface AccessCall {
  action: 'grant' | 'revoke';
  guildId: string;
  discordId: string;
}

export class FakeChannelAccess implements ChannelAccessGateway {
  readonly calls: AccessCall[] = [];
  /** Discord IDs that currently hold the overwrite */
  readonly members = new Set<string>();
  failuresRemaining = 0;
  beforeGrant: (() => Promise<void>) | null = null;

  async grant(guildId: string, discordId: string): Promise<void> {
    this.calls.push({ action: 'grant', guildId, discordId });
    if (this.beforeGrant) {
      const hook = this.beforeGrant;
      this.beforeGrant = null;
      await hook();
    }
    this.maybeFail();
    this.members.add(discordId);
  }

  async revoke(guildId: string, discordId: string): Promise<void> {
    this.calls.push({ action: 'revoke', guildId, discordId });
    this.maybeFail();
    this.members.delete(discordId);
  }

  count(action: 'grant' | 'revoke'): number {
    return this.calls.filter(call => call.action === action).length;
  }

  private maybeFail(): void {
    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
      throw new Error('Missing Access');
    }
  }
}

export class RecordingAlerts {
  readonly warnings: Array<{ guildId: string; title: string; message: string; context?: Record<string, unknown> }> = [];
  readonly errors: Array<{ guildId: string; error: Error; context: Record<string, unknown> }> = [];

  async notifyWarning(guildId: string, title: string, message: string, context?: Record<string, unknown>): Promise<void> {
    this.warnings.push({ guildId, title, message, context });
  }

  async notify(guildId: string, error: Error, context: Record<string, unknown>): Promise<void> {
    this.errors.push({ guildId, error, context });
  }
}
