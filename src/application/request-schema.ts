import { z } from 'zod';

/**
 * Zod schemas for the HTTP sidecar request bodies.
 *
 * Only the well-known user fields are kept; unknown keys are stripped.
 * Extra attributes belong under `custom`.
 */
export const userSchema = z.object({
  userID: z.string().optional(),
  email: z.string().optional(),
  ip: z.string().optional(),
  userAgent: z.string().optional(),
  country: z.string().optional(),
  locale: z.string().optional(),
  appVersion: z.string().optional(),
  custom: z.record(z.string(), z.unknown()).optional(),
  privateAttributes: z.record(z.string(), z.unknown()).optional(),
  customIDs: z.record(z.string(), z.string()).optional(),
});

export const checkGateRequestSchema = z.object({
  user: userSchema,
  gate: z.string().min(1).max(255),
});

export const getConfigRequestSchema = z.object({
  user: userSchema,
  config: z.string().min(1).max(255),
});

export const logEventRequestSchema = z.object({
  user: userSchema,
  eventName: z.string().min(1).max(255),
  value: z.union([z.string(), z.number(), z.null()]).default(null),
  metadata: z.record(z.string(), z.unknown()).nullable().default(null),
});

export type CheckGateRequest = z.infer<typeof checkGateRequestSchema>;
export type GetConfigRequest = z.infer<typeof getConfigRequestSchema>;
export type LogEventRequest = z.infer<typeof logEventRequestSchema>;
