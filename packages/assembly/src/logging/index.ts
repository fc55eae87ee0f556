export { JsonLineLogger, noopLogger, withMinimumLevel } from '@partkit/core/logging';
export type { LogLevel, StructuredLogEvent, StructuredLogger } from '@partkit/core/logging';
export { createAssemblyStageLoggingSubscriber } from './assembly-event-subscriber.js';
