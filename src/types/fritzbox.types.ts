import type { ResultValue } from './tr064.types';

export type { ConnectionConfig } from '../config/schemas/config.schema';

/**
 * Maps one field of an action's result to a collectd type / type instance
 */
export interface FieldMapping {
  readonly source: string;
  readonly type: string;
  readonly typeInstance: string;
  /** Turns a non-numeric field (e.g. a status string) into a gauge value */
  readonly convert?: (value: ResultValue) => number;
}

/**
 * One remote action polled every cycle and the fields taken from its result
 */
export interface MetricQuery {
  readonly service: string;
  readonly action: string;
  readonly fields: readonly FieldMapping[];
}

export type CollectorState = 'uninitialized' | 'ready' | 'shutdown';
