export type { SpecKind, SpecDefinition, SpecEntry } from './spec.js';
export type { User } from './user.js';
export type {
  EventMetadata,
  EventValue,
  ExposureEventName,
  SecondaryExposure,
  LogEvent,
  ExposureEvent,
  BufferedEvent,
} from './event.js';
export { GATE_EXPOSURE, CONFIG_EXPOSURE } from './event.js';
