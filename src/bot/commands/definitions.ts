import { SlashCommandBuilder } from 'discord.js';
import { STATUS_LIST } from '../../core/types';
import { MAX_LISTED } from './queries';

export const ping = new SlashCommandBuilder().setName('ping').setDescription('Botの動作確認');

export const get = new SlashCommandBuilder()
  .setName('get')
  .setDescription('ステータス別の曲一覧')
  .addStringOption((o) =>
    o
      .setName('status')
      .setDescription('ステータス')
      .addChoices(...STATUS_LIST.map((s) => ({ name: s, value: s })))
  )
  .addIntegerOption((o) => o.setName('count').setDescription('件数').setMinValue(1).setMaxValue(MAX_LISTED))
  .addBooleanOption((o) => o.setName('include_unassigned').setDescription('未割当を含める'))
  .addStringOption((o) => o.setName('charter').setDescription('難易度に含まれる文字列'));

export const search = new SlashCommandBuilder()
  .setName('search')
  .setDescription('曲名・作曲者・難易度で検索')
  .addStringOption((o) => o.setName('keyword').setDescription('キーワード').setRequired(true).setMinLength(1));

export const listadd = new SlashCommandBuilder()
  .setName('listadd')
  .setDescription('名義を登録')
  .addStringOption((o) => o.setName('name').setDescription('名義').setRequired(true).setMinLength(1))
  .addUserOption((o) => o.setName('user').setDescription('ユーザー').setRequired(true));

export const list = new SlashCommandBuilder().setName('list').setDescription('登録済みの名義一覧');

export const listopt = new SlashCommandBuilder()
  .setName('listopt')
  .setDescription('名義の追加・削除')
  .addStringOption((o) =>
    o
      .setName('action')
      .setDescription('操作')
      .setRequired(true)
      .addChoices({ name: '追加', value: 'add' }, { name: '削除', value: 'remove' })
  )
  .addUserOption((o) => o.setName('user').setDescription('ユーザー').setRequired(true))
  .addStringOption((o) => o.setName('new_name').setDescription('名義').setRequired(true).setMinLength(1));

export const deadline = new SlashCommandBuilder()
  .setName('deadline')
  .setDescription('自分の作業中・優先作業タスクをDMで確認');

export const commandDefinitions = [ping, get, search, listadd, list, listopt, deadline];

export function commandPayload() {
  return commandDefinitions.map((command) => command.toJSON());
}
