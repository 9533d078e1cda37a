import fs from "node:fs";
import { z } from "zod";
import { NexusError } from "../errors.js";

const WellSchema = z.object({
  id: z.string(),
  status: z.enum(["producing", "maintenance", "shut-in"]),
  productionBopd: z.number().optional(),
  downtimeHours: z.number().optional()
});

const BlockSchema = z.object({
  oilBopd: z.number().nonnegative(),
  gasMmscfd: z.number().nonnegative(),
  activeWells: z.number().int().nonnegative(),
  opexPerBarrelUsd: z.number().positive(),
  wells: z.array(WellSchema)
});

const FixturesSchema = z.object({
  exchangeRateUsdIdr: z.number().positive(),
  defaultOpexPerBarrelUsd: z.number().positive(),
  benchmarkPriceUsd: z.number().positive(),
  blocks: z.record(BlockSchema),
  liftings: z.array(z.object({
    block: z.string(),
    dayOffset: z.number().int().nonnegative(),
    volumeBarrels: z.number().int().positive(),
    vessel: z.string(),
    destination: z.string()
  })),
  vessels: z.record(z.object({
    origin: z.string(),
    destination: z.string(),
    currentLocation: z.string(),
    position: z.object({ latitude: z.number(), longitude: z.number() }),
    speedKnots: z.number(),
    status: z.enum(["on_schedule", "delayed"]),
    cargoVolumeBarrels: z.number().int(),
    etaHours: z.number()
  })),
  weather: z.record(z.object({
    waveHeightMeters: z.number().nonnegative(),
    windSpeedKnots: z.number().nonnegative(),
    visibilityKm: z.number().nonnegative()
  })),
  shipments: z.record(z.object({
    status: z.enum(["scheduled", "loading", "in_transit", "arrived", "discharged"]),
    progressPercentage: z.number().min(0).max(100),
    originBlock: z.string(),
    destinationRefinery: z.string(),
    vesselAssigned: z.string(),
    volumeBarrels: z.number().int()
  })),
  prices: z.record(z.object({
    currentUsd: z.number().positive(),
    thirtyDaysAgoUsd: z.number().positive(),
    volatility: z.enum(["low", "moderate", "high"]),
    outlook: z.string()
  }))
});

export type Fixtures = z.infer<typeof FixturesSchema>;
export type BlockFixture = z.infer<typeof BlockSchema>;

export const DEFAULT_FIXTURES_URL = new URL("../../../data/fixtures.json", import.meta.url);

/**
 * Reference data backing the bundled capabilities.
 */
export function loadFixtures(location: URL | string = DEFAULT_FIXTURES_URL): Fixtures {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(location, "utf8"));
  } catch (err) {
    throw new NexusError("INVALID_CONFIG", `Cannot read fixtures from ${String(location)}`, {
      cause: err instanceof Error ? err.message : String(err)
    });
  }
  const parsed = FixturesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NexusError("INVALID_CONFIG", "Fixture file does not match the expected shape", {
      issues: parsed.error.issues
    });
  }
  return parsed.data;
}

/**
 * Case-insensitive key lookup; returns the canonical key with its value.
 */
export function findEntry<T>(table: Record<string, T>, key: string): [string, T] | undefined {
  const wanted = key.trim().toLowerCase();
  for (const [name, value] of Object.entries(table)) {
    if (name.toLowerCase() === wanted) {
      return [name, value];
    }
  }
  return undefined;
}

export function lookup<T>(table: Record<string, T>, key: string, kind: string): [string, T] {
  const entry = findEntry(table, key);
  if (!entry) {
    throw new Error(`Unknown ${kind} "${key}". Known: ${Object.keys(table).join(", ")}`);
  }
  return entry;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
