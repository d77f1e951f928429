/**
 * Spec model for the flag cache.
 *
 * A spec is either a feature gate (boolean) or a dynamic config (JSON value).
 * The definition is kept as the raw JSON object the control service sent; only
 * the evaluator interprets it.
 */

export type SpecKind = 'feature_gate' | 'dynamic_config';

/** Raw spec object as it appears in a `download_config_specs` document. */
export type SpecDefinition = Record<string, unknown>;

export interface SpecEntry {
  readonly name: string;
  readonly kind: SpecKind;
  readonly definition: SpecDefinition;
}
