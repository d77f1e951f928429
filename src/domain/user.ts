/**
 * User context supplied by the caller of an evaluation.
 *
 * Opaque to the client core except for `privateAttributes`, which are
 * available to the evaluator but never written into telemetry.
 */
export interface User {
  readonly userID?: string;
  readonly email?: string;
  readonly ip?: string;
  readonly userAgent?: string;
  readonly country?: string;
  readonly locale?: string;
  readonly appVersion?: string;
  readonly custom?: Record<string, unknown>;
  readonly privateAttributes?: Record<string, unknown>;
  readonly customIDs?: Record<string, string>;
}
