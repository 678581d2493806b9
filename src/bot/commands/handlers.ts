import {
  EmbedBuilder,
  Interaction,
  InteractionDeferReplyOptions,
  InteractionEditReplyOptions,
  InteractionReplyOptions,
} from 'discord.js';
import { SheetSource } from '../../api/sheet-client';
import { RegistryError, errorMessage } from '../../core/errors';
import { checkOwnDeadlines } from '../../core/own-deadlines';
import { AddResult, AliasRegistry, RemoveResult } from '../../store/alias-registry';
import { Logger, childLogger } from '../../utils/logger';
import { MAX_EMBEDS, charterListEmbeds, deadlineEmbeds, taskListEmbed } from './format';
import { filterForGet, searchRows } from './queries';

export interface CommandContext {
  registry: AliasRegistry;
  sheet: SheetSource;
  logger?: Logger;
}

const logger = childLogger('commands');

// The slice of ChatInputCommandInteraction the handlers touch; tests pass fakes.
export interface SlashInteraction {
  readonly commandName: string;
  readonly deferred: boolean;
  readonly replied: boolean;
  user: { id: string; send(options: { embeds: EmbedBuilder[] }): Promise<unknown> };
  options: {
    getString(name: string): string | null;
    getInteger(name: string): number | null;
    getBoolean(name: string): boolean | null;
    getUser(name: string): { id: string } | null;
  };
  reply(options: string | InteractionReplyOptions): Promise<unknown>;
  deferReply(options?: InteractionDeferReplyOptions): Promise<unknown>;
  editReply(options: string | InteractionEditReplyOptions): Promise<unknown>;
  followUp(options: string | InteractionReplyOptions): Promise<unknown>;
}

type Handler = (interaction: SlashInteraction, ctx: CommandContext) => Promise<void>;

function requiredString(interaction: SlashInteraction, name: string): string {
  const value = interaction.options.getString(name);
  if (value === null) throw new Error(`missing required option "${name}" for /${interaction.commandName}`);
  return value;
}

function requiredUserId(interaction: SlashInteraction, name: string): string {
  const user = interaction.options.getUser(name);
  if (user === null) throw new Error(`missing required option "${name}" for /${interaction.commandName}`);
  return user.id;
}

export const MESSAGES = {
  pong: '🏓 Pong! Bot is working!',
  fetchFailed: '❌ APIへのアクセスに失敗しました',
  noRows: '🔍 該当する曲はありません',
  added: '✅ 追加しました',
  aliasAdded: '✅ 名義を追加しました',
  aliasUnchanged: 'ℹ️ すでに登録されています',
  removed: '🗑️ 削除しました',
  notAssociated: '❌ 紐づいていません',
  emptyRegistry: '📭 登録なし',
  invalidName: '❌ 名義を入力してください',
  noAliases: '❌ あなたの名義が /list に登録されていません',
  noTasks: '📭 現在、担当中のタスクはありません',
  dmSent: '📬 DMに担当中タスクを送信しました',
  dmFailed: '❌ DMを送信できませんでした。DMを受け取れる設定にしてください',
  unexpected: '❌ エラーが発生しました',
} as const;

export function listaddReply(result: AddResult): string {
  return result === 'added' ? MESSAGES.added : MESSAGES.aliasUnchanged;
}

export function listoptReply(result: AddResult | RemoveResult): string {
  switch (result) {
    case 'added':
      return MESSAGES.aliasAdded;
    case 'unchanged':
      return MESSAGES.aliasUnchanged;
    case 'removed':
      return MESSAGES.removed;
    case 'not-associated':
      return MESSAGES.notAssociated;
  }
}

const ping: Handler = async (interaction) => {
  await interaction.reply(MESSAGES.pong);
};

const get: Handler = async (interaction, ctx) => {
  await interaction.deferReply();
  const fetched = await ctx.sheet.fetchRows();
  if (!fetched.ok) {
    await interaction.editReply(MESSAGES.fetchFailed);
    return;
  }
  const rows = filterForGet(fetched.rows, {
    status: interaction.options.getString('status'),
    count: interaction.options.getInteger('count'),
    includeUnassigned: interaction.options.getBoolean('include_unassigned'),
    charter: interaction.options.getString('charter'),
  });
  if (rows.length === 0) {
    await interaction.editReply(MESSAGES.noRows);
    return;
  }
  await interaction.editReply({ embeds: [taskListEmbed(rows)] });
};

const search: Handler = async (interaction, ctx) => {
  await interaction.deferReply();
  const fetched = await ctx.sheet.fetchRows();
  if (!fetched.ok) {
    await interaction.editReply(MESSAGES.fetchFailed);
    return;
  }
  const rows = searchRows(fetched.rows, requiredString(interaction, 'keyword'));
  if (rows.length === 0) {
    await interaction.editReply(MESSAGES.noRows);
    return;
  }
  await interaction.editReply({ embeds: [taskListEmbed(rows)] });
};

async function replyRegistryEdit(interaction: SlashInteraction, edit: () => string): Promise<void> {
  let content: string;
  try {
    content = edit();
  } catch (err) {
    if (!(err instanceof RegistryError)) throw err;
    content = MESSAGES.invalidName;
  }
  await interaction.reply(content);
}

const listadd: Handler = async (interaction, ctx) => {
  const name = requiredString(interaction, 'name');
  const userId = requiredUserId(interaction, 'user');
  await replyRegistryEdit(interaction, () => listaddReply(ctx.registry.addAlias(name, userId)));
};

const list: Handler = async (interaction, ctx) => {
  const embeds = charterListEmbeds(ctx.registry.byIdentity());
  if (embeds.length === 0) {
    await interaction.reply(MESSAGES.emptyRegistry);
    return;
  }
  await interaction.reply({ embeds: embeds.slice(0, MAX_EMBEDS), allowedMentions: { parse: [] } });
};

const listopt: Handler = async (interaction, ctx) => {
  const action = requiredString(interaction, 'action');
  const userId = requiredUserId(interaction, 'user');
  const name = requiredString(interaction, 'new_name');
  await replyRegistryEdit(interaction, () =>
    listoptReply(action === 'add' ? ctx.registry.addAlias(name, userId) : ctx.registry.removeAlias(name, userId))
  );
};

const deadline: Handler = async (interaction, ctx) => {
  await interaction.deferReply({ ephemeral: true });
  const result = await checkOwnDeadlines(interaction.user.id, ctx.registry, ctx.sheet);

  switch (result.kind) {
    case 'no-aliases':
      await interaction.editReply(MESSAGES.noAliases);
      return;
    case 'fetch-failed':
      await interaction.editReply(MESSAGES.fetchFailed);
      return;
    case 'none':
      await interaction.editReply(MESSAGES.noTasks);
      return;
    case 'found':
      break;
  }

  try {
    await interaction.user.send({ embeds: deadlineEmbeds(result.assignments) });
  } catch (err) {
    (ctx.logger ?? logger).warn({ user: interaction.user.id, error: errorMessage(err) }, 'deadline DM failed');
    await interaction.editReply(MESSAGES.dmFailed);
    return;
  }
  await interaction.editReply(MESSAGES.dmSent);
};

export const handlers: ReadonlyMap<string, Handler> = new Map<string, Handler>([
  ['ping', ping],
  ['get', get],
  ['search', search],
  ['listadd', listadd],
  ['list', list],
  ['listopt', listopt],
  ['deadline', deadline],
]);

export async function handleInteraction(interaction: Interaction, ctx: CommandContext): Promise<void> {
  if (!interaction.isChatInputCommand()) return;
  await runCommand(interaction, ctx);
}

/** Dispatches one slash command; every failure is logged and answered with a short error. */
export async function runCommand(interaction: SlashInteraction, ctx: CommandContext): Promise<void> {
  const log = ctx.logger ?? logger;
  const handler = handlers.get(interaction.commandName);
  if (!handler) {
    log.warn({ command: interaction.commandName }, 'unknown command');
    return;
  }

  try {
    await handler(interaction, ctx);
  } catch (err) {
    log.error({ err, command: interaction.commandName, user: interaction.user.id }, 'command failed');
    try {
      if (interaction.deferred || interaction.replied) {
        await interaction.followUp({ content: MESSAGES.unexpected, ephemeral: true });
      } else {
        await interaction.reply({ content: MESSAGES.unexpected, ephemeral: true });
      }
    } catch (replyErr) {
      log.warn({ error: errorMessage(replyErr) }, 'could not report command failure');
    }
  }
}
