// Re-export all types
export type {
  Job,
  JobStatus,
  JobOutcome,
  JobResult,
  JobRequest,
  ResultEvent,
  DispatchMessage,
  Trigger,
  PeriodicDefinition,
  ResultHandler,
} from "./types";
export { canTransition, isTerminal, isDispatchable, statusForOutcome } from "./job-state";
export * from "./errors";

// Re-export store interfaces and classes
export type { JobStore } from "./store/base-store";
export { InMemoryJobStore } from "./store/memory-store";
export { PostgreSQLJobStore } from "./store/postgresql-store";

// Re-export broker gateways
export type { BrokerGateway } from "./broker/broker-gateway";
export { RabbitMQGateway } from "./broker/rabbitmq-gateway";
export type { RabbitMQGatewayOptions } from "./broker/rabbitmq-gateway";
export { encodeDispatch, decodeResultMessage } from "./broker/messages";

// Re-export engine components
export { JobExecutor } from "./engine/job-executor";
export { ResultConsumer } from "./engine/result-consumer";
export type { ResultHandling } from "./engine/result-consumer";
export { PeriodicChecker } from "./engine/periodic-checker";
export type { SweepReport } from "./engine/periodic-checker";
export { Scheduler } from "./engine/scheduler";
export type { TriggerInfo } from "./engine/scheduler";

export { loadConfig, toPeriodicDefinition } from "./config";
export type { AppConfig } from "./config";
export { createHealthApp } from "./http/health";
export type { HealthSource, HealthAppOptions } from "./http/health";
export { SchedulerService } from "./service";

// Helpers
export { at, every, nextFireTime } from "./utils/triggers";
export { JobEvent, onJobEvent } from "./utils/job-event";
export type { JobEventType, JobEventData } from "./utils/job-event";
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
