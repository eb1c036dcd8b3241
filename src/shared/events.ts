import { EventEmitter } from 'eventemitter3';
import type { PipelineState } from '../queue/types.js';
import type { Verdict } from './constants.js';

/**
 * All typed events emitted by the discovery pipeline and scheduler.
 * Keys are event names; values are the payload shape passed to listeners.
 */
export interface AppEvents {
  'pipeline:state': {
    cadence: string;
    from: PipelineState;
    to: PipelineState;
  };
  'source:failed': {
    source: string;
    error: string;
  };
  'candidate:stored': {
    link: string;
    verdict: Verdict;
    rankScore: number;
  };
  'candidate:skipped': {
    link: string;
    reason: 'duplicate' | 'in-batch-duplicate';
  };
  'candidate:failed': {
    link: string;
    error: string;
    quarantined: boolean;
  };
  'delivery:completed': {
    link: string;
    sentCount: number;
    failedCount: number;
  };
  'digest:sent': {
    items: number;
  };
}

type AppEventListeners = {
  [K in keyof AppEvents]: (payload: AppEvents[K]) => void;
};

/**
 * Strongly-typed event emitter. Each application context owns one
 * instance; tests create their own.
 */
export class TypedEventEmitter extends EventEmitter<AppEventListeners> {}
