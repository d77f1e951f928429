import type {
  EventMetadata,
  EventValue,
  ExposureEvent,
  ExposureEventName,
  LogEvent,
  SecondaryExposure,
  User,
} from '../domain/index.js';

/** Copy of the user without `privateAttributes`. */
export function sanitizeUser(user: User): User {
  if (user.privateAttributes === undefined) return user;
  const copy: { -readonly [K in keyof User]: User[K] } = { ...user };
  delete copy.privateAttributes;
  return copy;
}

export function createLogEvent(
  user: User,
  eventName: string,
  value: EventValue,
  metadata: EventMetadata | null,
  time: number,
): LogEvent {
  return {
    eventName,
    user: sanitizeUser(user),
    value,
    metadata,
    time,
  };
}

export function createExposureEvent(
  user: User,
  eventName: ExposureEventName,
  metadata: Record<string, string>,
  secondaryExposures: readonly SecondaryExposure[],
  time: number,
): ExposureEvent {
  return {
    eventName,
    user: sanitizeUser(user),
    value: null,
    metadata,
    secondaryExposures,
    time,
  };
}
