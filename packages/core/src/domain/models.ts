import { z } from 'zod';

export const NotificationKindSchema = z.enum(['success', 'error', 'warning', 'info']);
export type NotificationKind = z.infer<typeof NotificationKindSchema>;

export const DEFAULT_NOTIFICATION_KIND: NotificationKind = 'info';

export const NOTIFICATION_ICONS = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ'
} as const satisfies Record<NotificationKind, string>;

export type NotificationState = 'active' | 'removing' | 'gone';

export const NotificationActionSchema = z.object({
  label: z.string(),
  command: z.string().min(1)
});

export type NotificationAction = z.infer<typeof NotificationActionSchema>;

export interface Notification {
  id: string;
  /** Plain text. Views must render it as text content, never as markup. */
  message: string;
  kind: NotificationKind;
  icon: string;
  durationMs: number;
  actions: readonly NotificationAction[];
  createdAt: number;
}

export interface NotificationSnapshot extends Notification {
  state: Exclude<NotificationState, 'gone'>;
}

export const StoredEntrySchema = z.object({
  value: z.unknown(),
  expireAt: z.number().nullable()
});

export type StoredEntry = z.infer<typeof StoredEntrySchema>;

export const MODIFIER_KEYS = ['ctrl', 'alt', 'shift', 'meta'] as const;
export type ModifierKey = (typeof MODIFIER_KEYS)[number];

export interface ShortcutSummary {
  key: string;
  description: string;
}
