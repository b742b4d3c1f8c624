import type { PipelineErrorCode } from '../../lib/errors.js';
import type { Query } from '../query/query.types.js';

export type QueryState =
  | 'received'
  | 'normalizing'
  | 'resolving'
  | 'awaiting_selection'
  | 'resolved'
  | 'rendering'
  | 'publishing'
  | 'done'
  | 'failed';

export interface SelectionOption {
  externalId: string;
  title: string;
  year?: number;
  score: number;
}

export type DoneResult = {
  status: 'done';
  queryId: string;
  externalId: string;
  version: number;
  /** false when the deduper suppressed the post; channelRef is then the earlier post */
  published: boolean;
  channelRef: string;
};

export type FailedResult = {
  status: 'failed';
  queryId: string;
  query: Query;
  code: PipelineErrorCode;
  message: string;
};

export type RunResult = DoneResult | FailedResult;

export type StateEvent =
  | { state: 'received'; at: number; query: Query }
  | { state: 'normalizing' | 'resolving' | 'rendering' | 'publishing'; at: number }
  | { state: 'awaiting_selection'; at: number; options: SelectionOption[] }
  | { state: 'resolved'; at: number; externalId: string; version: number; stale: boolean }
  | { state: 'done'; at: number; result: DoneResult }
  | { state: 'failed'; at: number; result: FailedResult };

export type StateListener = (event: StateEvent) => void;

export interface QuerySubscription {
  readonly id: string;
  readonly state: QueryState;
  /** Replays every transition so far, then follows live ones; returns an unsubscribe function */
  subscribe(listener: StateListener): () => void;
  /** Settles with the terminal state; never rejects */
  readonly result: Promise<RunResult>;
}

export interface QuerySnapshot {
  id: string;
  state: QueryState;
  history: StateEvent[];
  result?: RunResult;
}
