/**
 * kubectl style event table
 *
 * Default {@link EventDescriber}: prints the Type / Reason / Age / From / Message table
 * `kubectl describe` shows, with columns aligned the way a tab writer with two spaces
 * of padding would align them.
 */

import type { Event, EventList } from '../types/kubernetes.js';
import type { EventDescriber } from './render.js';

const COLUMN_PADDING = 2;
const HEADER = ['Type', 'Reason', 'Age', 'From', 'Message'];
const UNDERLINE = ['----', '------', '----', '----', '-------'];

export interface KubectlEventDescriberOptions {
  /** Clock used to compute event ages */
  now?: () => Date;
}

/**
 * Short human readable duration: `45s`, `5m`, `3h`, `12d`, `2y`
 */
export function shortHumanDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < -1) {
    return '<invalid>';
  }
  if (seconds < 0) {
    return '0s';
  }
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `${hours}h`;
  }
  const days = Math.floor(hours / 24);
  if (days < 365) {
    return `${days}d`;
  }
  return `${Math.floor(days / 365)}y`;
}

function indentation(level: number): string {
  return '  '.repeat(level);
}

function alignColumns(rows: string[][], prefix: string): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      if (i < row.length - 1) {
        widths[i] = Math.max(widths[i] ?? 0, cell.length);
      }
    });
  }
  return rows
    .map(
      (row) =>
        prefix +
        row
          .map((cell, i) => (i < row.length - 1 ? cell.padEnd(widths[i] + COLUMN_PADDING) : cell))
          .join('') +
        '\n',
    )
    .join('');
}

export class KubectlEventDescriber implements EventDescriber {
  private readonly now: () => Date;

  constructor(options: KubectlEventDescriberOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  describe(events: EventList | undefined, indent: number): string {
    const prefix = indentation(indent);
    if (!events || events.items.length === 0) {
      return `${prefix}${'Events:'.padEnd('Events:'.length + COLUMN_PADDING)}<none>\n`;
    }

    const rows = [HEADER, UNDERLINE, ...events.items.map((e) => this.row(e))];
    return `${prefix}Events:\n` + alignColumns(rows, prefix + indentation(1));
  }

  private row(event: Event): string[] {
    return [
      event.type ?? '',
      event.reason ?? '',
      this.interval(event),
      event.source?.component || event.reportingComponent || '',
      (event.message ?? '').trim(),
    ];
  }

  private interval(event: Event): string {
    const last = this.age(event.lastTimestamp ?? event.eventTime);
    if (event.count !== undefined && event.count > 1) {
      const first = this.age(event.firstTimestamp ?? event.eventTime);
      return `${last} (x${event.count} over ${first})`;
    }
    return last;
  }

  private age(timestamp: string | undefined): string {
    const at = timestamp ? Date.parse(timestamp) : Number.NaN;
    if (Number.isNaN(at)) {
      return '<unknown>';
    }
    return shortHumanDuration(this.now().getTime() - at);
  }
}
