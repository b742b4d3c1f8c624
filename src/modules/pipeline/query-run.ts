import { createChildLogger } from '../../lib/logger.js';
import type { RankedCandidate, Selection } from '../resolver/ambiguity.resolver.js';
import type { Query } from '../query/query.types.js';
import type {
  QuerySnapshot,
  QueryState,
  QuerySubscription,
  RunResult,
  StateEvent,
  StateListener,
} from './pipeline.types.js';

const logger = createChildLogger('query-run');

interface PendingSelection {
  selection: Selection;
  settle(choice: RankedCandidate): void;
}

/** One query moving through the pipeline; the coordinator drives it */
export class QueryRun implements QuerySubscription {
  readonly history: StateEvent[] = [];
  readonly controller = new AbortController();
  pendingSelection: PendingSelection | undefined;
  outcome: RunResult | undefined;
  readonly result: Promise<RunResult>;

  private readonly listeners = new Set<StateListener>();
  private resolveResult: (result: RunResult) => void = () => undefined;

  constructor(
    readonly id: string,
    readonly query: Query,
  ) {
    this.result = new Promise((resolve) => {
      this.resolveResult = resolve;
    });
  }

  get state(): QueryState {
    return this.history.at(-1)?.state ?? 'received';
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Past `resolved`, cancellation no longer applies */
  get pastResolution(): boolean {
    return this.history.some((event) => event.state === 'resolved');
  }

  transition(event: StateEvent): void {
    this.history.push(event);
    logger.debug({ queryId: this.id, state: event.state }, 'Query state changed');
    for (const listener of this.listeners) {
      this.notify(listener, event);
    }
  }

  subscribe(listener: StateListener): () => void {
    for (const event of this.history) {
      this.notify(listener, event);
    }
    if (this.outcome) return () => undefined;

    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  finish(result: RunResult): void {
    this.outcome = result;
    this.listeners.clear();
    this.resolveResult(result);
  }

  snapshot(): QuerySnapshot {
    const snapshot: QuerySnapshot = { id: this.id, state: this.state, history: [...this.history] };
    if (this.outcome) snapshot.result = this.outcome;
    return snapshot;
  }

  private notify(listener: StateListener, event: StateEvent): void {
    try {
      listener(event);
    } catch (error) {
      logger.warn({ queryId: this.id, state: event.state, err: error }, 'State listener threw');
    }
  }
}
