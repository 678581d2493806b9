import { EmbedBuilder, TimestampStyles, time, userMention } from 'discord.js';
import {
  Assignment,
  DIFFICULTY_SLOTS,
  FIELD,
  STATUS_EMOJI,
  TaskRow,
  isTaskStatus,
  titleOf,
} from '../../core/types';

// Discord embed limits
export const MAX_FIELDS = 25;
export const MAX_EMBEDS = 10;
const FIELD_NAME_LIMIT = 256;
const FIELD_VALUE_LIMIT = 1024;
const BLANK = '\u200b';

export const COLORS = {
  taskList: 0x5865f2,
  charterList: 0x57f287,
  deadline: 0xfee75c,
} as const;

export const STATUS_LEGEND = Object.entries(STATUS_EMOJI)
  .map(([status, emoji]) => `${emoji} ${status}`)
  .join(' ');

export function truncate(text: string, limit: number): string {
  return text.length <= limit ? text : `${text.slice(0, limit - 1)}…`;
}

export function statusEmoji(status: string | undefined): string {
  return status && isTaskStatus(status) ? STATUS_EMOJI[status] : '❓';
}

export function taskFieldName(row: TaskRow): string {
  return truncate(`${statusEmoji(row[FIELD.status])} ${titleOf(row)} / ${row[FIELD.composer] ?? ''}`, FIELD_NAME_LIMIT);
}

export function slotSummary(row: TaskRow): string {
  return truncate(DIFFICULTY_SLOTS.map((slot) => `**${slot}**:${row[slot] || '-'}`).join('\n'), FIELD_VALUE_LIMIT);
}

export function taskListEmbed(rows: readonly TaskRow[]): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('🎵 曲一覧')
    .setColor(COLORS.taskList)
    .addFields(
      rows.slice(0, MAX_FIELDS).map((row) => ({ name: taskFieldName(row), value: slotSummary(row), inline: false }))
    )
    .setFooter({ text: `凡例:${STATUS_LEGEND}` });
}

/** One field per member; split across embeds when there are more than 25. */
export function charterListEmbeds(byIdentity: ReadonlyMap<string, readonly string[]>): EmbedBuilder[] {
  const fields = [...byIdentity].map(([identity, names]) => ({
    name: BLANK,
    value: truncate(`${userMention(identity)}\n${names.join(' / ')}`, FIELD_VALUE_LIMIT),
    inline: false,
  }));

  const embeds: EmbedBuilder[] = [];
  for (let i = 0; i < fields.length && embeds.length < MAX_EMBEDS; i += MAX_FIELDS) {
    const embed = new EmbedBuilder().setColor(COLORS.charterList).addFields(fields.slice(i, i + MAX_FIELDS));
    if (i === 0) embed.setTitle('📋 Charter一覧');
    embeds.push(embed);
  }
  return embeds;
}

export function assignmentField(assignment: Assignment): { name: string; value: string; inline: boolean } {
  return {
    name: truncate(assignment.title, FIELD_NAME_LIMIT),
    value: `**担当難易度**:${assignment.slots.join(' / ')}\n**納期**:${time(assignment.target, TimestampStyles.RelativeTime)}`,
    inline: false,
  };
}

export function deadlineEmbeds(assignments: readonly Assignment[]): EmbedBuilder[] {
  const embeds: EmbedBuilder[] = [];
  for (let i = 0; i < assignments.length && embeds.length < MAX_EMBEDS; i += MAX_FIELDS) {
    const embed = new EmbedBuilder()
      .setColor(COLORS.deadline)
      .addFields(assignments.slice(i, i + MAX_FIELDS).map(assignmentField));
    if (i === 0) embed.setTitle('⏰ 担当中のタスク');
    embeds.push(embed);
  }
  return embeds;
}
