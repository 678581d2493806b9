import { DiscordAPIError, RESTJSONErrorCodes } from 'discord.js';
import { DirectoryClient, DiscordRecipientGateway, GuildLike } from '../bot/discord/recipient-gateway';

function apiError(code: number): DiscordAPIError {
  return new DiscordAPIError({ code, message: 'Unknown Member' }, code, 404, 'GET', '/guilds/1/members/2', {});
}

class FakeGuild implements GuildLike {
  constructor(cached: string[], private readonly fetchImpl: (id: string) => Promise<unknown>) {
    this.members = { cache: new Set(cached), fetch: (id: string) => this.fetchImpl(id) };
  }
  members: GuildLike['members'];
}

function fakeClient(guilds: Record<string, GuildLike>, send = jest.fn().mockResolvedValue(undefined)) {
  const fetchUser = jest.fn(async () => ({ send }));
  const client: DirectoryClient = {
    guilds: { cache: new Map(Object.entries(guilds)) },
    users: { fetch: fetchUser },
  };
  return { client, send, fetchUser };
}

describe('DiscordRecipientGateway', () => {
  const notFound = () => Promise.reject(apiError(RESTJSONErrorCodes.UnknownMember));

  it('finds members in the cache without fetching', async () => {
    const fetchMember = jest.fn(notFound);
    const { client } = fakeClient({ '10': new FakeGuild(['111'], fetchMember) });

    expect(await new DiscordRecipientGateway(client, ['10']).isPoolMember('111')).toBe(true);
    expect(fetchMember).not.toHaveBeenCalled();
  });

  it('falls back to fetching the member from each configured guild', async () => {
    const { client } = fakeClient({
      '10': new FakeGuild([], notFound),
      '20': new FakeGuild([], async () => ({ id: '111' })),
    });

    expect(await new DiscordRecipientGateway(client, ['10', '20']).isPoolMember('111')).toBe(true);
  });

  it('treats unknown members and unconfigured guilds as not a member', async () => {
    const { client } = fakeClient({
      '10': new FakeGuild([], notFound),
      '30': new FakeGuild(['111'], notFound),
    });

    expect(await new DiscordRecipientGateway(client, ['10', '99']).isPoolMember('111')).toBe(false);
  });

  it('propagates other errors', async () => {
    const { client } = fakeClient({ '10': new FakeGuild([], () => Promise.reject(new Error('rate limited'))) });

    await expect(new DiscordRecipientGateway(client, ['10']).isPoolMember('111')).rejects.toThrow('rate limited');
  });

  it('sends a DM through the fetched user', async () => {
    const { client, send, fetchUser } = fakeClient({});

    await new DiscordRecipientGateway(client, []).sendDirect('111', 'hello');

    expect(fetchUser).toHaveBeenCalledWith('111');
    expect(send).toHaveBeenCalledWith('hello');
  });
});
