import { randomUUID } from 'crypto';
import pino, { type DestinationStream, type Logger } from 'pino';
import { AppError } from '../errors.js';
import { componentLogger } from '../logger.js';

export type AuditResult = 'success' | 'failure' | 'denied';

export interface AuditEvent {
  readonly id: string;
  readonly ts: string; // ISO timestamp
  readonly actor: string;
  readonly action: string;
  readonly result: AuditResult;
  readonly targetType?: string;
  readonly targetId?: string;
  readonly requestId?: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export type AuditInput = Omit<AuditEvent, 'id' | 'ts'>;

export interface AuditSink {
  /** Must throw when the event could not be written. */
  write(event: AuditEvent): void;
}

/** One JSON line per event through a dedicated pino instance with a synchronous destination. */
export class PinoAuditSink implements AuditSink {
  private readonly out: Logger;

  constructor(destination: string | number | DestinationStream = 1) {
    const stream =
      typeof destination === 'string' || typeof destination === 'number'
        ? pino.destination({ dest: destination, sync: true, mkdir: true })
        : destination;
    this.out = pino({ base: { stream: 'audit' }, timestamp: pino.stdTimeFunctions.isoTime }, stream);
  }

  write(event: AuditEvent): void {
    this.out.info({ audit: event }, event.action);
  }
}

export type AuditSortField = 'ts' | 'actor' | 'action' | 'result';
const SORT_FIELDS: readonly AuditSortField[] = ['ts', 'actor', 'action', 'result'];

export interface AuditQueryOptions {
  limit?: number;
  cursor?: string;
  actor?: string;
  action?: string;
  result?: AuditResult;
  sort?: string;
  dir?: string;
}

export interface AuditQueryResult {
  items: AuditEvent[];
  nextCursor?: string;
}

export interface AuditStats {
  since: string;
  buffered: number;
  counters: Record<string, number>;
}

function isSortField(value: string | undefined): value is AuditSortField {
  return SORT_FIELDS.some((f) => f === value);
}

/**
 * Append-only audit trail. Every event goes to the sink first; only written
 * events are kept in the in-memory window and counted.
 */
export class AuditLog {
  private readonly events: AuditEvent[] = [];
  private readonly counters = new Map<string, number>();
  private readonly since = new Date().toISOString();

  constructor(
    private readonly sink: AuditSink,
    private readonly capacity = 1000,
    private readonly log: Logger = componentLogger('audit'),
  ) {}

  record(input: AuditInput): AuditEvent {
    const event: AuditEvent = Object.freeze({
      id: randomUUID(),
      ts: new Date().toISOString(),
      ...input,
      details: input.details ? Object.freeze({ ...input.details }) : undefined,
    });
    try {
      this.sink.write(event);
    } catch (err) {
      this.log.error({ err, action: event.action, requestId: event.requestId }, 'audit write failed');
      throw new AppError('AuditWriteFailed', 'failed to record audit event', { cause: err });
    }
    this.events.push(event);
    if (this.events.length > this.capacity) this.events.shift();
    const key = `${event.action}:${event.result}`;
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
    return event;
  }

  /** Best-effort variant for failure paths: a sink error is logged, never thrown. */
  tryRecord(input: AuditInput): AuditEvent | undefined {
    try {
      return this.record(input);
    } catch (err) {
      this.log.warn({ err, action: input.action }, 'dropping audit event');
      return undefined;
    }
  }

  query(opts: AuditQueryOptions = {}): AuditQueryResult {
    const limit = Math.min(Math.max(opts.limit ?? 50, 1), 200);
    let ordered = [...this.events];
    if (opts.actor) ordered = ordered.filter((e) => e.actor === opts.actor);
    if (opts.action) ordered = ordered.filter((e) => e.action === opts.action);
    if (opts.result) ordered = ordered.filter((e) => e.result === opts.result);
    const sortField: AuditSortField = isSortField(opts.sort) ? opts.sort : 'ts';
    const dir = opts.dir === 'asc' ? 1 : -1;
    // index keeps events recorded within the same millisecond in insertion order
    const position = new Map(this.events.map((e, i) => [e.id, i]));
    ordered.sort((a, b) => {
      const av = a[sortField];
      const bv = b[sortField];
      if (av < bv) return -1 * dir;
      if (av > bv) return 1 * dir;
      return ((position.get(a.id) ?? 0) - (position.get(b.id) ?? 0)) * dir;
    });

    let startIndex = 0;
    if (opts.cursor) {
      const idx = ordered.findIndex((e) => e.id === opts.cursor);
      if (idx >= 0) startIndex = idx + 1;
    }
    const page = ordered.slice(startIndex, startIndex + limit);
    const nextExists = ordered.length > startIndex + page.length;
    return { items: page, nextCursor: nextExists ? page[page.length - 1].id : undefined };
  }

  stats(): AuditStats {
    return {
      since: this.since,
      buffered: this.events.length,
      counters: Object.fromEntries([...this.counters.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))),
    };
  }
}
