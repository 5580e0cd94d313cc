/**
 * Execution pipeline, executor and summarizer contracts
 * @module @faultline/shared/types/execution
 */

/**
 * Classification of an execution event
 */
export type ExecutionEventKind =
  | 'info'            // Progress output
  | 'success'         // A step completed
  | 'chaos-occurred'  // The fault was injected
  | 'error';          // Producer failure, always terminal

/**
 * Pipeline phases
 */
export type PipelinePhase = 'idle' | 'confirmed' | 'running' | 'complete';

/**
 * One timestamped entry of the execution log
 */
export interface ExecutionEvent {
  /** Position in the stream, starting at 0 */
  readonly sequence: number;
  /** Milliseconds since the run started (monotonic) */
  readonly timestamp: number;
  /** Log text */
  readonly text: string;
  /** Classification */
  readonly kind: ExecutionEventKind;
}

/**
 * Untimestamped event as yielded by an executor
 */
export interface ProducedEvent {
  text: string;
  kind: ExecutionEventKind;
}

/**
 * What an executor receives for one run
 */
export interface ExecutionRequest {
  experimentId: string;
  documentKind: string;
  action: string;
  target: string;
  duration: string;
  /** Rendered artifact text */
  artifact: string;
}

/**
 * Produces the event stream of one run.
 *
 * The returned iterable is lazy, finite and not restartable. Completion of
 * the iterable is the end-of-stream marker; throwing from it reports a
 * producer failure.
 */
export interface Executor {
  readonly name: string;
  execute(request: ExecutionRequest): AsyncIterable<ProducedEvent>;
}

/**
 * What a summarizer receives
 */
export interface SummaryRequest {
  documentKind: string;
  action: string;
  target: string;
  duration: string;
  /** Concatenated log text, one event per line */
  logs: string;
}

/**
 * External text-generation collaborator that summarizes a run
 */
export interface Summarizer {
  readonly name: string;
  summarize(request: SummaryRequest): Promise<string>;
}

/**
 * All event kinds
 */
export const ALL_EVENT_KINDS: readonly ExecutionEventKind[] = [
  'info',
  'success',
  'chaos-occurred',
  'error',
] as const;
