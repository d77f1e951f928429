import type { EventMetadata, EventValue, User } from '../domain/index.js';
import { CONFIG_EXPOSURE, GATE_EXPOSURE } from '../domain/index.js';
import type { EventBuffer } from './event-buffer.js';
import { createExposureEvent, createLogEvent } from './event-factory.js';
import type { Evaluator } from './ports.js';
import type { SpecStore } from './spec-store.js';

export interface ConfigResult {
  readonly value: Record<string, unknown>;
  readonly ruleID: string;
}

/**
 * Answers gate/config evaluations from the spec cache and records an
 * exposure for every answer, default fallbacks included.
 *
 * Holds no state of its own: the store and buffer belong to the coordinator,
 * and the gateway is only ever called from inside the coordinator's mailbox.
 */
export class EvaluationGateway {
  private readonly store: SpecStore;
  private readonly buffer: EventBuffer;
  private readonly evaluator: Evaluator;
  /** Clock function, injectable for tests. */
  private readonly nowFn: () => number;

  constructor(
    store: SpecStore,
    buffer: EventBuffer,
    evaluator: Evaluator,
    nowFn: () => number = Date.now,
  ) {
    this.store = store;
    this.buffer = buffer;
    this.evaluator = evaluator;
    this.nowFn = nowFn;
  }

  evaluateGate(user: User, name: string): boolean {
    const result = this.evaluator.evaluate(user, this.store.lookup(name), 'feature_gate');

    this.buffer.append(
      createExposureEvent(
        user,
        GATE_EXPOSURE,
        { gate: name, gateValue: String(result.value), ruleID: result.ruleID },
        result.secondaryExposures,
        this.nowFn(),
      ),
    );

    return result.value;
  }

  evaluateConfig(user: User, name: string): ConfigResult {
    const result = this.evaluator.evaluate(user, this.store.lookup(name), 'dynamic_config');

    this.buffer.append(
      createExposureEvent(
        user,
        CONFIG_EXPOSURE,
        { config: name, ruleID: result.ruleID },
        result.secondaryExposures,
        this.nowFn(),
      ),
    );

    return { value: result.jsonValue, ruleID: result.ruleID };
  }

  logEvent(
    user: User,
    eventName: string,
    value: EventValue = null,
    metadata: EventMetadata | null = null,
  ): void {
    this.buffer.append(createLogEvent(user, eventName, value, metadata, this.nowFn()));
  }
}
