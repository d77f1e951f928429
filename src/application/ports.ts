import type { SecondaryExposure, SpecEntry, SpecKind, User } from '../domain/index.js';

/** Endpoints the client core talks to. */
export type Endpoint = 'download_config_specs' | 'rgstr';

/**
 * Network collaborator.
 *
 * Resolves to the response body on success, or `null` on any failure
 * (network error, timeout, non-2xx status). Implementations should not
 * reject; the coordinator treats a rejection the same as `null`.
 */
export interface Transport {
  request(apiKey: string, endpoint: Endpoint, payload: Record<string, unknown>): Promise<string | null>;
}

export interface EvaluationResult {
  readonly value: boolean;
  readonly jsonValue: Record<string, unknown>;
  readonly ruleID: string;
  readonly secondaryExposures: readonly SecondaryExposure[];
}

/**
 * Rule-matching collaborator.
 *
 * `spec` is whatever the cache holds under the requested name, or
 * `undefined`. It may be of a different kind than `kind` when a name is
 * shared between a gate and a config; the evaluator decides what that means.
 */
export interface Evaluator {
  evaluate(user: User, spec: SpecEntry | undefined, kind: SpecKind): EvaluationResult;
}
