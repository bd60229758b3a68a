/**
 * Progress Port Interface
 *
 * Structured progress events streamed from the generation pipeline to any
 * UI frontend. Unlike OutputPort (user-facing messages), these are
 * machine-readable and may be rendered as spinners, status lines or not at all.
 */

/** Base event shape -- all events carry a type discriminant and timestamp. */
export interface ProgressEventBase {
  /** ISO 8601 timestamp of when the event was emitted. */
  timestamp: string;
}

export type PipelineStage = 'inheritance' | 'validation' | 'dependencies' | 'composition' | 'emission';

export type PipelineProgressEvent =
  | { type: 'pipeline:start'; template: string }
  | { type: 'pipeline:stage'; stage: PipelineStage; status: 'started' | 'completed' | 'failed'; detail?: string }
  | { type: 'pipeline:complete'; template: string; success: boolean };

export type EmissionProgressEvent =
  | { type: 'emit:file'; path: string; status: 'written' | 'planned' }
  | { type: 'emit:complete'; summary: { written: number } };

export type ProgressEvent = ProgressEventBase & (PipelineProgressEvent | EmissionProgressEvent);

export type ProgressLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ProgressPort {
  /** Fire-and-forget: callers never wait for the UI */
  emit(event: ProgressEvent): void;
  log(level: ProgressLogLevel, message: string): void;
}

/** Stamp an event with the current time. */
export function progressEvent(event: PipelineProgressEvent | EmissionProgressEvent): ProgressEvent {
  return { ...event, timestamp: new Date().toISOString() };
}
