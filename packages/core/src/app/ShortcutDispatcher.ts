import type { ShortcutSummary } from '../domain/models';
import { serializeError } from '../domain/errors';
import type { KeyEventSource, KeyPressEvent } from '../ports/KeyEventSource';
import type { RuntimeLogger } from '../ports/RuntimeLogger';
import { silentLogger } from '../ports/RuntimeLogger';

export type ShortcutHandler = (event: KeyPressEvent) => void;

interface ShortcutBinding {
  handler: ShortcutHandler;
  description: string;
}

export function normalizeCombination(combination: string): string {
  return combination.toLowerCase().split('+').sort().join('+');
}

export function combinationFromEvent(event: KeyPressEvent): string {
  const parts: string[] = [];
  if (event.ctrlKey) parts.push('ctrl');
  if (event.altKey) parts.push('alt');
  if (event.shiftKey) parts.push('shift');
  if (event.metaKey) parts.push('meta');
  parts.push(event.key.toLowerCase());
  return normalizeCombination(parts.join('+'));
}

export class ShortcutDispatcher {
  private readonly bindings = new Map<string, ShortcutBinding>();
  private readonly logger: RuntimeLogger;
  private readonly listener = (event: KeyPressEvent): void => {
    this.dispatch(event);
  };
  private source?: KeyEventSource;

  constructor(source?: KeyEventSource, logger: RuntimeLogger = silentLogger) {
    this.logger = logger;
    if (source) {
      this.attach(source);
    }
  }

  attach(source: KeyEventSource): void {
    if (this.source === source) {
      return;
    }
    this.detach();
    source.addEventListener('keydown', this.listener);
    this.source = source;
  }

  detach(): void {
    this.source?.removeEventListener('keydown', this.listener);
    this.source = undefined;
  }

  /** Registering a combination that is already bound replaces the previous binding. */
  register(combination: string, handler: ShortcutHandler, description = ''): void {
    this.bindings.set(normalizeCombination(combination), { handler, description });
  }

  unregister(combination: string): void {
    this.bindings.delete(normalizeCombination(combination));
  }

  /** Returns true when the event matched a binding. */
  dispatch(event: KeyPressEvent): boolean {
    const combination = combinationFromEvent(event);
    const binding = this.bindings.get(combination);
    if (!binding) {
      return false;
    }

    event.preventDefault();
    try {
      binding.handler(event);
    } catch (error) {
      this.logger.error('Shortcut handler failed', {
        combination,
        error: serializeError(error)
      });
    }
    return true;
  }

  getShortcuts(): ShortcutSummary[] {
    return Array.from(this.bindings.entries(), ([key, binding]) => ({
      key,
      description: binding.description
    }));
  }
}
