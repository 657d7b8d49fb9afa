import {
  DEFAULT_NOTIFICATION_KIND,
  NOTIFICATION_ICONS,
  NotificationActionSchema,
  NotificationKindSchema
} from '../domain/models';
import type {
  Notification,
  NotificationAction,
  NotificationKind,
  NotificationSnapshot,
  NotificationState
} from '../domain/models';
import { serializeError } from '../domain/errors';
import type { NotificationView } from '../ports/NotificationView';
import type { RuntimeLogger } from '../ports/RuntimeLogger';
import { silentLogger } from '../ports/RuntimeLogger';
import { generateId } from '../utils/time';

export const DEFAULT_NOTIFICATION_DURATION_MS = 3000;
export const DEFAULT_REMOVAL_GRACE_MS = 300;

export interface NotificationCommandContext {
  notificationId: string;
  command: string;
}

export type NotificationCommandHandler = (context: NotificationCommandContext) => void;

export interface NotificationCenterOptions {
  view?: NotificationView;
  defaultDurationMs?: number;
  /** Delay between marking a notification for removal and detaching it. 0 detaches at once. */
  removalGraceMs?: number;
  idGenerator?: () => string;
  logger?: RuntimeLogger;
}

interface RegistryEntry {
  notification: Notification;
  state: Exclude<NotificationState, 'gone'>;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * Owns the set of visible notifications and their timers.
 *
 * Lifecycle per notification: active -> removing -> gone. The auto-dismiss timer
 * and manual `remove` race for the first transition; whichever comes second is a
 * no-op. One instance per page, created by the composition root.
 */
export class NotificationCenter {
  private readonly registry = new Map<string, RegistryEntry>();
  private readonly commands = new Map<string, NotificationCommandHandler>();
  private readonly view?: NotificationView;
  private readonly defaultDurationMs: number;
  private readonly removalGraceMs: number;
  private readonly idGenerator: () => string;
  private readonly logger: RuntimeLogger;

  constructor(options: NotificationCenterOptions = {}) {
    this.view = options.view;
    this.defaultDurationMs = options.defaultDurationMs ?? DEFAULT_NOTIFICATION_DURATION_MS;
    this.removalGraceMs = options.removalGraceMs ?? DEFAULT_REMOVAL_GRACE_MS;
    this.idGenerator = options.idGenerator ?? (() => generateId());
    this.logger = options.logger ?? silentLogger;
  }

  show(
    message: string,
    kind: NotificationKind | string = DEFAULT_NOTIFICATION_KIND,
    durationMs: number = this.defaultDurationMs,
    actions: readonly NotificationAction[] = []
  ): string {
    const id = this.nextId();
    const resolvedKind = this.resolveKind(kind);
    const notification: Notification = {
      id,
      message: String(message),
      kind: resolvedKind,
      icon: NOTIFICATION_ICONS[resolvedKind],
      durationMs: this.resolveDuration(durationMs),
      actions: this.resolveActions(actions),
      createdAt: Date.now()
    };

    const entry: RegistryEntry = { notification, state: 'active' };
    this.registry.set(id, entry);

    if (notification.durationMs > 0) {
      entry.timer = setTimeout(() => {
        entry.timer = undefined;
        this.remove(id);
      }, notification.durationMs);
    }
    this.renderView('mount', id, view => view.mount(notification));

    return id;
  }

  remove(id: string): void {
    const entry = this.registry.get(id);
    if (!entry || entry.state !== 'active') {
      return;
    }

    entry.state = 'removing';
    if (entry.timer !== undefined) {
      clearTimeout(entry.timer);
      entry.timer = undefined;
    }
    this.renderView('markRemoving', id, view => view.markRemoving(id));

    if (this.removalGraceMs <= 0) {
      this.detach(id, entry);
      return;
    }

    setTimeout(() => this.detach(id, entry), this.removalGraceMs);
  }

  /**
   * Starts removal of every notification in registry order. Afterwards none is
   * active; the registry itself empties once the grace delay has elapsed.
   */
  clear(): void {
    for (const id of Array.from(this.registry.keys())) {
      this.remove(id);
    }
  }

  get(id: string): NotificationSnapshot | undefined {
    const entry = this.registry.get(id);
    return entry ? { ...entry.notification, state: entry.state } : undefined;
  }

  stateOf(id: string): NotificationState {
    return this.registry.get(id)?.state ?? 'gone';
  }

  list(): NotificationSnapshot[] {
    return Array.from(this.registry.values(), entry => ({
      ...entry.notification,
      state: entry.state
    }));
  }

  get size(): number {
    return this.registry.size;
  }

  registerCommand(command: string, handler: NotificationCommandHandler): void {
    this.commands.set(command, handler);
  }

  unregisterCommand(command: string): void {
    this.commands.delete(command);
  }

  /**
   * Runs the handler registered for the action at `index` on an active
   * notification. Returns false when there is nothing to run.
   */
  triggerAction(id: string, index: number): boolean {
    const entry = this.registry.get(id);
    if (!entry || entry.state !== 'active') {
      return false;
    }

    const action = entry.notification.actions[index];
    if (!action) {
      return false;
    }

    const handler = this.commands.get(action.command);
    if (!handler) {
      this.logger.warn('No handler registered for notification command', {
        notificationId: id,
        command: action.command
      });
      return false;
    }

    try {
      handler({ notificationId: id, command: action.command });
    } catch (error) {
      this.logger.error('Notification command handler failed', {
        notificationId: id,
        command: action.command,
        error: serializeError(error)
      });
    }
    return true;
  }

  private detach(id: string, entry: RegistryEntry): void {
    if (this.registry.get(id) !== entry) {
      return;
    }
    this.registry.delete(id);
    this.renderView('unmount', id, view => view.unmount(id));
  }

  private renderView(
    operation: 'mount' | 'markRemoving' | 'unmount',
    id: string,
    call: (view: NotificationView) => void
  ): void {
    if (!this.view) {
      return;
    }
    try {
      call(this.view);
    } catch (error) {
      this.logger.error('Notification view failed', { operation, id, error: serializeError(error) });
    }
  }

  private nextId(): string {
    let id = this.idGenerator();
    while (this.registry.has(id)) {
      id = this.idGenerator();
    }
    return id;
  }

  private resolveKind(kind: string): NotificationKind {
    const parsed = NotificationKindSchema.safeParse(kind);
    if (parsed.success) {
      return parsed.data;
    }
    this.logger.warn('Unknown notification kind; using default', {
      kind,
      fallback: DEFAULT_NOTIFICATION_KIND
    });
    return DEFAULT_NOTIFICATION_KIND;
  }

  private resolveDuration(durationMs: number): number {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      this.logger.warn('Invalid notification duration; using default', {
        durationMs,
        fallback: this.defaultDurationMs
      });
      return this.defaultDurationMs;
    }
    return Math.ceil(durationMs);
  }

  private resolveActions(actions: readonly NotificationAction[]): NotificationAction[] {
    const resolved: NotificationAction[] = [];
    for (const candidate of actions) {
      const parsed = NotificationActionSchema.safeParse(candidate);
      if (!parsed.success) {
        this.logger.warn('Dropping malformed notification action', { action: candidate });
        continue;
      }
      if (!this.commands.has(parsed.data.command)) {
        this.logger.warn('Notification action references an unregistered command', {
          command: parsed.data.command
        });
      }
      resolved.push({ label: parsed.data.label, command: parsed.data.command });
    }
    return resolved;
  }
}
