import { openDatabase, type DatabaseHandle } from '../../src/db/index.js';
import { migrate } from '../../src/db/migrate.js';
import { SqliteAirdropStore } from '../../src/db/sqlite-store.js';
import type { CheckOutcome, SourceFetcher, TrustCheck, TrustCheckInput } from '../../src/discovery/types.js';
import type { DistributionTarget, SendOutcome } from '../../src/notification/types.js';
import type { RawCandidate } from '../../src/types/index.js';

export interface TestClock {
  now: () => Date;
  set(iso: string): void;
  advance(ms: number): void;
}

export function createClock(iso: string): TestClock {
  let current = new Date(iso);
  return {
    now: () => current,
    set(next) {
      current = new Date(next);
    },
    advance(ms) {
      current = new Date(current.getTime() + ms);
    },
  };
}

export interface TestStore {
  handle: DatabaseHandle;
  store: SqliteAirdropStore;
}

/** Fresh in-memory database with the schema applied. */
export function createTestStore(now?: () => Date): TestStore {
  const handle = openDatabase(':memory:');
  migrate(handle.sqlite);
  return { handle, store: new SqliteAirdropStore(handle.db, { now }) };
}

/** Records every send; outcomes default to success. */
export class RecordingTarget implements DistributionTarget {
  readonly name = 'recording';
  readonly sent: Array<{ recipientId: string; text: string }> = [];
  readonly outcomes = new Map<string, SendOutcome>();
  readonly throwing = new Map<string, Error>();

  async send(recipientId: string, text: string): Promise<SendOutcome> {
    const error = this.throwing.get(recipientId);
    if (error) throw error;
    const outcome = this.outcomes.get(recipientId) ?? 'success';
    if (outcome === 'success') this.sent.push({ recipientId, text });
    return outcome;
  }

  textsFor(recipientId: string): string[] {
    return this.sent.filter((entry) => entry.recipientId === recipientId).map((entry) => entry.text);
  }
}

/** Source returning a fixed batch, or failing with the given error. */
export class StaticSource implements SourceFetcher {
  readonly name = 'static';
  calls = 0;

  constructor(public result: RawCandidate[] | Error) {}

  async fetch(limit: number): Promise<RawCandidate[]> {
    this.calls++;
    if (this.result instanceof Error) throw this.result;
    return this.result.slice(0, limit);
  }
}

/** Check whose behaviour is supplied per test. */
export class StubCheck implements TrustCheck {
  calls = 0;

  constructor(
    readonly name: string,
    readonly maxPenalty: number,
    private readonly behaviour: (input: TrustCheckInput) => Promise<CheckOutcome>,
    readonly fallbackPenalty = 10,
  ) {}

  async run(input: TrustCheckInput): Promise<CheckOutcome> {
    this.calls++;
    return this.behaviour(input);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
