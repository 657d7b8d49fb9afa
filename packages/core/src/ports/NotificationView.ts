import type { Notification } from '../domain/models';

/**
 * Container anchor for visible notifications. The center calls `mount` once per
 * notification, `markRemoving` when its exit transition should start and
 * `unmount` when it is detached.
 */
export interface NotificationView {
  mount(notification: Notification): void;
  markRemoving(id: string): void;
  unmount(id: string): void;
}
