import type { SpecEntry, SpecKind, User } from '../domain/index.js';
import type { EvaluationResult, Evaluator } from './ports.js';

const DEFAULT_RULE_ID = 'default';

function fallback(): EvaluationResult {
  return { value: false, jsonValue: {}, ruleID: '', secondaryExposures: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Evaluator that ignores targeting rules and answers from the spec's
 * `defaultValue`.
 *
 * - Unknown spec, or a spec of the other kind: `false` / `{}` with an empty rule id.
 * - Gate: `true` only when `enabled` is not `false` and `defaultValue === true`.
 * - Config: `defaultValue` when it is a JSON object, `{}` otherwise.
 *   A disabled config still returns its default value.
 *
 * Used when the embedding application does not inject a rule engine.
 */
export class DefaultValueEvaluator implements Evaluator {
  evaluate(_user: User, spec: SpecEntry | undefined, kind: SpecKind): EvaluationResult {
    if (spec === undefined || spec.kind !== kind) return fallback();

    const { definition } = spec;
    const defaultValue = definition['defaultValue'];

    if (kind === 'feature_gate') {
      const enabled = definition['enabled'] !== false;
      return {
        value: enabled && defaultValue === true,
        jsonValue: {},
        ruleID: DEFAULT_RULE_ID,
        secondaryExposures: [],
      };
    }

    return {
      value: false,
      jsonValue: isRecord(defaultValue) ? defaultValue : {},
      ruleID: DEFAULT_RULE_ID,
      secondaryExposures: [],
    };
  }
}
