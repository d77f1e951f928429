import type { User } from './user.js';

/** Free-form metadata attached to a logged event. */
export type EventMetadata = Record<string, unknown>;

export type EventValue = string | number | null;

export const GATE_EXPOSURE = 'gate_exposure';
export const CONFIG_EXPOSURE = 'config_exposure';

export type ExposureEventName = typeof GATE_EXPOSURE | typeof CONFIG_EXPOSURE;

/** Another gate consulted while evaluating the primary gate or config. */
export interface SecondaryExposure {
  readonly gate: string;
  readonly gateValue: string;
  readonly ruleID: string;
}

/**
 * Telemetry event as it is buffered and shipped to `rgstr`.
 *
 * `time` is epoch milliseconds at the moment the event was created.
 */
export interface LogEvent {
  readonly eventName: string;
  readonly user: User;
  readonly value: EventValue;
  readonly metadata: EventMetadata | null;
  readonly time: number;
}

export interface ExposureEvent extends LogEvent {
  readonly eventName: ExposureEventName;
  readonly value: null;
  readonly metadata: Record<string, string>;
  readonly secondaryExposures: readonly SecondaryExposure[];
}

/** Anything the buffer may hold. */
export type BufferedEvent = LogEvent | ExposureEvent;
