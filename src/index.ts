/**
 * Public API.
 */

export { loadConfig } from "./nexus/config.js";
export type { NexusConfig, ReasoningConfig } from "./nexus/config.js";
export { NexusError, CapabilityError, toNexusError } from "./nexus/errors.js";
export type { NexusErrorCode, CapabilityErrorReason } from "./nexus/errors.js";
export { logger, createChildLogger, setLogLevel, LOG_LEVELS } from "./nexus/logger.js";
export type { LogLevel } from "./nexus/logger.js";
export * from "./nexus/messages.js";
export { SPECIALISTS } from "./nexus/specialists.js";
export type { SpecialistDefinition } from "./nexus/specialists.js";
export * from "./nexus/capabilities/index.js";
export * from "./nexus/reasoning/index.js";
export * from "./nexus/orchestrator/index.js";
export { ConcurrencyLimiter, CapacityExceededError } from "./nexus/utils/concurrencyLimiter.js";
export { Deadline } from "./nexus/utils/deadline.js";
export { createApp, startHttpServer } from "./server/http.js";
export { VERSION } from "./version.js";
