const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

export interface Debounced<Args extends unknown[]> {
  (...args: Args): void;
  cancel(): void;
}

/**
 * Trailing-edge debounce: only the last call inside any `waitMs` window runs,
 * `waitMs` after that call, with that call's arguments.
 */
export function debounce<Args extends unknown[]>(
  fn: (...args: Args) => void,
  waitMs: number
): Debounced<Args> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const debounced = (...args: Args): void => {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    timer = setTimeout(() => {
      timer = undefined;
      fn(...args);
    }, waitMs);
  };

  debounced.cancel = (): void => {
    if (timer !== undefined) {
      clearTimeout(timer);
      timer = undefined;
    }
  };

  return debounced;
}

/**
 * Leading-edge throttle. Calls made while the window is open are dropped.
 */
export function throttle<Args extends unknown[]>(
  fn: (...args: Args) => void,
  limitMs: number
): (...args: Args) => void {
  let inWindow = false;

  return (...args: Args): void => {
    if (inWindow) {
      return;
    }
    fn(...args);
    inWindow = true;
    setTimeout(() => {
      inWindow = false;
    }, limitMs);
  };
}

export interface RelativeTimeOptions {
  now?: number;
  locale?: string;
}

export function formatRelativeTime(
  timestamp: number | string | Date,
  options: RelativeTimeOptions = {}
): string {
  const date = timestamp instanceof Date ? timestamp : new Date(timestamp);
  const now = options.now ?? Date.now();
  const diff = now - date.getTime();

  if (diff < MINUTE_MS) {
    return 'just now';
  }
  if (diff < HOUR_MS) {
    return ago(Math.floor(diff / MINUTE_MS), 'minute');
  }
  if (diff < DAY_MS) {
    return ago(Math.floor(diff / HOUR_MS), 'hour');
  }
  if (diff < WEEK_MS) {
    return ago(Math.floor(diff / DAY_MS), 'day');
  }
  return date.toLocaleDateString(options.locale ?? 'en-US');
}

function ago(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'} ago`;
}

/** Random v4-shaped identifier. Not suitable for anything security related. */
export function generateId(random: () => number = Math.random): string {
  return 'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, c => {
    const r = Math.floor(random() * 16);
    const v = c === 'x' ? r : (r & 0x3) | 0x8;
    return v.toString(16);
  });
}
