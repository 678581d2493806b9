// Core data types for the chart task sheet

/** Column names exactly as the sheet exports them. */
export const FIELD = {
  title: '曲名',
  composer: '作曲者',
  status: 'ステータス',
  targetDate: '本収録日',
} as const;

export const DIFFICULTY_SLOTS = ['Sp', 'Sm', 'Am', 'Wt'] as const;
export type DifficultySlot = (typeof DIFFICULTY_SLOTS)[number];

export const STATUS_LIST = [
  '未割当',
  '作業中',
  '優先作業',
  '準作業',
  '調整中',
  '配信待ち',
  '完了',
  '期間限定',
] as const;
export type TaskStatus = (typeof STATUS_LIST)[number];

export const DEFAULT_STATUS: TaskStatus = '作業中';
export const UNASSIGNED_STATUS: TaskStatus = '未割当';
export const IN_PROGRESS_STATUSES: ReadonlySet<string> = new Set<TaskStatus>(['作業中', '優先作業']);

export const STATUS_EMOJI: Record<TaskStatus, string> = {
  未割当: '⬜',
  作業中: '🟨',
  優先作業: '🔴',
  準作業: '🟦',
  調整中: '🟪',
  配信待ち: '🟩',
  完了: '✅',
  期間限定: '⏳',
};

export const UNTITLED = '不明';

/**
 * A row as fetched from the sheet. Cells are strings after validation; any
 * column may be missing and unknown columns are kept.
 */
export type TaskRow = Readonly<Record<string, string | undefined>>;

export type MilestoneTag = 'week3' | 'week2';

export interface Milestone {
  leadDays: number;
  tag: MilestoneTag;
}

// Order matters: the 3-week reminder is evaluated first.
export const MILESTONES: readonly Milestone[] = [
  { leadDays: 21, tag: 'week3' },
  { leadDays: 14, tag: 'week2' },
];

/** A row the requester (or a recipient) is assigned to, with the matched slots. */
export interface Assignment {
  title: string;
  slots: DifficultySlot[];
  dateString: string;
  target: Date;
}

export function isTaskStatus(value: string): value is TaskStatus {
  return STATUS_LIST.some((status) => status === value);
}

export function cell(row: TaskRow, column: string): string {
  return row[column] ?? '';
}

/** Falls back only when the column is absent; an empty title stays empty. */
export function titleOf(row: TaskRow): string {
  return row[FIELD.title] ?? UNTITLED;
}
