import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NotificationCenter, type NotificationView, type RuntimeLogger } from '@frontdesk/core';
import { RecordingNotificationView, sequentialIds } from '../fixtures/host';

const makeLogger = (): RuntimeLogger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

describe('NotificationCenter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns a fresh id that remove accepts immediately', () => {
    const center = new NotificationCenter();

    const id = center.show('Hello');

    expect(center.stateOf(id)).toBe('active');
    expect(() => center.remove(id)).not.toThrow();
    expect(center.stateOf(id)).toBe('removing');
  });

  it('regenerates ids that collide with a live notification', () => {
    const ids = ['dup', 'dup', 'other'];
    const center = new NotificationCenter({ idGenerator: () => ids.shift() ?? 'spare' });

    const first = center.show('one', 'info', 0);
    const second = center.show('two', 'info', 0);

    expect(first).toBe('dup');
    expect(second).toBe('other');
    expect(center.size).toBe(2);
  });

  it('applies defaults and appends in call order', () => {
    const center = new NotificationCenter({ idGenerator: sequentialIds() });

    center.show('first');
    center.show('second', 'success', 0, [{ label: 'Undo', command: 'undo' }]);

    expect(center.list()).toEqual([
      expect.objectContaining({
        id: 'n-1',
        message: 'first',
        kind: 'info',
        icon: 'ℹ',
        durationMs: 3000,
        actions: [],
        state: 'active'
      }),
      expect.objectContaining({
        id: 'n-2',
        message: 'second',
        kind: 'success',
        icon: '✓',
        durationMs: 0,
        actions: [{ label: 'Undo', command: 'undo' }],
        state: 'active'
      })
    ]);
  });

  it('falls back to info for unknown kinds and logs the fallback', () => {
    const logger = makeLogger();
    const center = new NotificationCenter({ logger });

    const id = center.show('odd', 'critical');

    expect(center.get(id)?.kind).toBe('info');
    expect(logger.warn).toHaveBeenCalledWith('Unknown notification kind; using default', {
      kind: 'critical',
      fallback: 'info'
    });
  });

  it('keeps markup-looking messages as literal text', () => {
    const view = new RecordingNotificationView();
    const center = new NotificationCenter({ view, idGenerator: sequentialIds() });

    center.show('<img src=x onerror=alert(1)>', 'warning', 0);

    expect(view.calls).toEqual([
      { op: 'mount', id: 'n-1', message: '<img src=x onerror=alert(1)>' }
    ]);
  });

  it('expires after the duration and detaches after the grace delay', () => {
    const view = new RecordingNotificationView();
    const center = new NotificationCenter({ view, idGenerator: sequentialIds() });

    const id = center.show('Saved', 'success', 1000);

    vi.advanceTimersByTime(999);
    expect(center.stateOf(id)).toBe('active');

    vi.advanceTimersByTime(1);
    expect(center.stateOf(id)).toBe('removing');
    expect(center.list()).toHaveLength(1);

    vi.advanceTimersByTime(300);
    expect(center.stateOf(id)).toBe('gone');
    expect(center.get(id)).toBeUndefined();
    expect(center.list()).toEqual([]);
    expect(view.calls).toEqual([
      { op: 'mount', id, message: 'Saved' },
      { op: 'markRemoving', id },
      { op: 'unmount', id }
    ]);
  });

  it('keeps zero-duration notifications until removed', () => {
    const center = new NotificationCenter();

    const id = center.show('Sticky', 'info', 0);
    vi.advanceTimersByTime(60_000);

    expect(center.stateOf(id)).toBe('active');
  });

  it('transitions once when remove is called twice while active', () => {
    const view = new RecordingNotificationView();
    const center = new NotificationCenter({ view, idGenerator: sequentialIds() });
    const id = center.show('Twice', 'info', 0);

    expect(() => {
      center.remove(id);
      center.remove(id);
    }).not.toThrow();
    vi.advanceTimersByTime(300);
    center.remove(id);

    expect(view.calls.filter(call => call.op === 'markRemoving')).toHaveLength(1);
    expect(view.calls.filter(call => call.op === 'unmount')).toHaveLength(1);
    expect(center.stateOf(id)).toBe('gone');
  });

  it('lets a manual remove win over the pending auto-dismiss timer', () => {
    const view = new RecordingNotificationView();
    const center = new NotificationCenter({ view, idGenerator: sequentialIds() });
    const id = center.show('Race', 'info', 500);

    vi.advanceTimersByTime(400);
    center.remove(id);
    vi.advanceTimersByTime(5000);

    expect(view.calls).toEqual([
      { op: 'mount', id, message: 'Race' },
      { op: 'markRemoving', id },
      { op: 'unmount', id }
    ]);
  });

  it('ignores ids that were never shown', () => {
    const center = new NotificationCenter();

    expect(() => center.remove('missing')).not.toThrow();
    expect(center.stateOf('missing')).toBe('gone');
  });

  it('detaches immediately when the grace delay is zero', () => {
    const center = new NotificationCenter({ removalGraceMs: 0 });
    const id = center.show('Now', 'info', 0);

    center.remove(id);

    expect(center.stateOf(id)).toBe('gone');
    expect(center.size).toBe(0);
  });

  it('clear marks everything for removal and empties after the grace delay', () => {
    const view = new RecordingNotificationView();
    const center = new NotificationCenter({ view, idGenerator: sequentialIds() });
    center.show('a', 'info', 0);
    center.show('b', 'error', 0);
    center.show('c', 'warning', 10_000);

    center.clear();

    expect(center.list().map(item => item.state)).toEqual(['removing', 'removing', 'removing']);
    expect(view.calls.filter(call => call.op === 'markRemoving').map(call => call.id)).toEqual([
      'n-1',
      'n-2',
      'n-3'
    ]);

    vi.advanceTimersByTime(300);
    expect(center.size).toBe(0);
  });

  it('runs registered command handlers for notification actions', () => {
    const center = new NotificationCenter({ idGenerator: sequentialIds() });
    const retry = vi.fn();
    center.registerCommand('retry-upload', retry);

    const id = center.show('Upload failed', 'error', 0, [
      { label: 'Dismiss', command: 'dismiss' },
      { label: 'Retry', command: 'retry-upload' }
    ]);

    expect(center.triggerAction(id, 1)).toBe(true);
    expect(retry).toHaveBeenCalledWith({ notificationId: 'n-1', command: 'retry-upload' });
    expect(center.triggerAction(id, 0)).toBe(false);
    expect(center.triggerAction(id, 5)).toBe(false);
  });

  it('does not run actions once removal has started', () => {
    const center = new NotificationCenter();
    const handler = vi.fn();
    center.registerCommand('open', handler);
    const id = center.show('Report ready', 'info', 0, [{ label: 'Open', command: 'open' }]);

    center.remove(id);

    expect(center.triggerAction(id, 0)).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });

  it('logs handler failures instead of throwing', () => {
    const logger = makeLogger();
    const center = new NotificationCenter({ logger });
    center.registerCommand('explode', () => {
      throw new Error('boom');
    });
    const id = center.show('Careful', 'info', 0, [{ label: 'Go', command: 'explode' }]);

    expect(center.triggerAction(id, 0)).toBe(true);
    expect(logger.error).toHaveBeenCalledWith(
      'Notification command handler failed',
      expect.objectContaining({ command: 'explode' })
    );
  });

  it('stops resolving a command after it is unregistered', () => {
    const center = new NotificationCenter();
    const handler = vi.fn();
    center.registerCommand('open', handler);
    const id = center.show('Report ready', 'info', 0, [{ label: 'Open', command: 'open' }]);

    center.unregisterCommand('open');

    expect(center.triggerAction(id, 0)).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });

  it('keeps its lifecycle going when the view throws', () => {
    const logger = makeLogger();
    const broken = (): void => {
      throw new Error('dom gone');
    };
    const view: NotificationView = { mount: broken, markRemoving: broken, unmount: broken };
    const center = new NotificationCenter({ view, logger, removalGraceMs: 300 });

    let id = '';
    expect(() => {
      id = center.show('hi', 'info', 1000);
    }).not.toThrow();
    expect(center.stateOf(id)).toBe('active');

    vi.advanceTimersByTime(1000);
    expect(center.stateOf(id)).toBe('removing');
    vi.advanceTimersByTime(300);
    expect(center.stateOf(id)).toBe('gone');
    expect(center.size).toBe(0);

    expect(logger.error).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenCalledWith(
      'Notification view failed',
      expect.objectContaining({ operation: 'mount', id })
    );
  });

  it('rounds fractional durations up so they still expire', () => {
    const center = new NotificationCenter({ removalGraceMs: 0 });

    const id = center.show('blink', 'info', 0.5);

    expect(center.get(id)?.durationMs).toBe(1);
    vi.advanceTimersByTime(1);
    expect(center.stateOf(id)).toBe('gone');
  });

  it('uses the default duration for negative or non-finite durations', () => {
    const center = new NotificationCenter({ defaultDurationMs: 2000 });

    const negative = center.show('neg', 'info', -5);
    const infinite = center.show('inf', 'info', Number.POSITIVE_INFINITY);

    expect(center.get(negative)?.durationMs).toBe(2000);
    expect(center.get(infinite)?.durationMs).toBe(2000);
  });
});
