export { SpecStore } from './spec-store.js';
export { specDocumentSchema, parseSpecDocument } from './spec-schema.js';
export type { SpecDocument, SpecDocumentParseResult } from './spec-schema.js';
export { EventBuffer, partition, deliverBatches, DEFAULT_FLUSH_BATCH_SIZE } from './event-buffer.js';
export { createLogEvent, createExposureEvent, sanitizeUser } from './event-factory.js';
export { EvaluationGateway } from './evaluation-gateway.js';
export type { ConfigResult } from './evaluation-gateway.js';
export { DefaultValueEvaluator } from './default-evaluator.js';
export type { Endpoint, Transport, Evaluator, EvaluationResult } from './ports.js';
export { Mailbox } from './mailbox.js';
export {
  RepeatingTask,
  createSyncScheduler,
  createFlushScheduler,
  DEFAULT_POLLING_INTERVAL_MS,
  DEFAULT_FLUSH_INTERVAL_MS,
} from './scheduler.js';
export { Coordinator } from './coordinator.js';
export type { CoordinatorOptions, CoordinatorPhase, CoordinatorStatus } from './coordinator.js';
export { InitializationError, CoordinatorStateError, ConfigurationError } from './errors.js';
export {
  userSchema,
  checkGateRequestSchema,
  getConfigRequestSchema,
  logEventRequestSchema,
} from './request-schema.js';
export type { CheckGateRequest, GetConfigRequest, LogEventRequest } from './request-schema.js';
