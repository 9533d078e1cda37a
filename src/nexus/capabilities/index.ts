/**
 * Capability module.
 *
 * Exports:
 * - Registry and contracts used by the orchestrator
 * - Fixture-backed capability sets for the bundled specialists
 */

export type {
  CapabilityContext,
  CapabilityDeclaration,
  CapabilityDefinition,
  CapabilityInvoker,
  CapabilityOutcome,
  InvokeOptions,
  JsonSchemaProperty,
  ParametersSchema
} from "./types.js";
export { defineCapability } from "./types.js";
export { CapabilityRegistry } from "./registry.js";
export { loadFixtures, DEFAULT_FIXTURES_URL } from "./fixtures.js";
export type { Fixtures } from "./fixtures.js";

import { CapabilityRegistry } from "./registry.js";
import { loadFixtures, type Fixtures } from "./fixtures.js";
import { upstreamCapabilities } from "./upstream.js";
import { logisticsCapabilities } from "./logistics.js";
import { financeCapabilities } from "./finance.js";

export type FixtureRegistryOptions = {
  fixtures?: Fixtures;
  now?: () => Date;
};

/**
 * Registry wired with the bundled upstream, logistics and finance capabilities.
 */
export function createFixtureRegistry(options: FixtureRegistryOptions = {}): CapabilityRegistry {
  const fixtures = options.fixtures ?? loadFixtures();
  const now = options.now ?? (() => new Date());
  return new CapabilityRegistry()
    .registerAll("upstream", upstreamCapabilities(fixtures, now))
    .registerAll("logistics", logisticsCapabilities(fixtures))
    .registerAll("finance", financeCapabilities(fixtures));
}
