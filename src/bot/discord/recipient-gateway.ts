import { DiscordAPIError, RESTJSONErrorCodes } from 'discord.js';
import { RecipientGateway } from '../../core/deadline-reconciler';
import { TokenBucket } from '../../utils/token-bucket';

// The slice of the discord.js Client this gateway touches; tests pass fakes.
export interface GuildLike {
  members: {
    cache: { has(id: string): boolean };
    fetch(id: string): Promise<unknown>;
  };
}

export interface DirectoryClient {
  guilds: { cache: { get(id: string): GuildLike | undefined } };
  users: { fetch(id: string): Promise<{ send(content: string): Promise<unknown> }> };
}

export interface GatewayOptions {
  /** DMs per second across all recipients */
  messagesPerSecond?: number;
}

export function isUnknownMemberError(err: unknown): boolean {
  return (
    err instanceof DiscordAPIError &&
    (err.code === RESTJSONErrorCodes.UnknownMember || err.code === RESTJSONErrorCodes.UnknownUser)
  );
}

export class DiscordRecipientGateway implements RecipientGateway {
  private readonly bucket: TokenBucket;

  constructor(
    private readonly client: DirectoryClient,
    private readonly guildIds: readonly string[],
    options: GatewayOptions = {}
  ) {
    const rate = options.messagesPerSecond ?? 2;
    this.bucket = new TokenBucket(rate, rate);
  }

  async isPoolMember(identity: string): Promise<boolean> {
    for (const guildId of this.guildIds) {
      const guild = this.client.guilds.cache.get(guildId);
      if (!guild) continue;
      if (guild.members.cache.has(identity)) return true;
      try {
        await guild.members.fetch(identity);
        return true;
      } catch (err) {
        if (isUnknownMemberError(err)) continue;
        throw err;
      }
    }
    return false;
  }

  async sendDirect(identity: string, content: string): Promise<void> {
    await this.bucket.acquire();
    const user = await this.client.users.fetch(identity);
    await user.send(content);
  }
}
