/**
 * How a routing run ended
 *
 * - completed: input was exhausted
 * - consumer-closed: the reader of the default output went away early
 */
export type RunStatus = 'completed' | 'consumer-closed';

/**
 * Per-sink counters for a run
 */
export interface SinkStats {
  /** Sink name */
  name: string;

  /** Lines claimed by this sink (discarded lines included) */
  matched: number;
}

/**
 * Summary of a routing run
 */
export interface RunSummary {
  status: RunStatus;

  /** Lines read from the input */
  linesRead: number;

  /** Lines written to the default output */
  passedThrough: number;

  /** Unclaimed lines dropped because pass-through is disabled */
  dropped: number;

  /** Counters in sink declaration order */
  sinks: SinkStats[];

  /** Wall time spent routing (ms) */
  elapsedMs: number;
}
