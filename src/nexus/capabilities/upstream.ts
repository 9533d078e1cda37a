import { z } from "zod";
import { defineCapability, type CapabilityDefinition } from "./types.js";
import { lookup, type Fixtures } from "./fixtures.js";

const DAY_MS = 24 * 60 * 60 * 1000;

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function upstreamCapabilities(fixtures: Fixtures, now: () => Date): CapabilityDefinition[] {
  const getProductionData = defineCapability({
    name: "get_production_data",
    description: "Current daily oil (BOPD) and gas (MMSCFD) production for an oil and gas block.",
    parameters: {
      type: "object",
      properties: {
        block_name: { type: "string", description: "Block name, e.g. Rokan, Mahakam, Cepu" }
      },
      required: ["block_name"]
    },
    args: z.object({ block_name: z.string().min(1) }),
    result: z.object({
      block: z.string(),
      date: z.string(),
      oil_production_bopd: z.number(),
      gas_production_mmscfd: z.number(),
      wells_active: z.number(),
      status: z.string()
    }),
    handler: ({ block_name }) => {
      const [block, info] = lookup(fixtures.blocks, block_name, "block");
      return {
        block,
        date: isoDate(now()),
        oil_production_bopd: info.oilBopd,
        gas_production_mmscfd: info.gasMmscfd,
        wells_active: info.activeWells,
        status: info.oilBopd > 0 ? "operational" : "idle"
      };
    }
  });

  const getLiftingSchedule = defineCapability({
    name: "get_lifting_schedule",
    description: "Scheduled tanker liftings from a block for the coming days.",
    parameters: {
      type: "object",
      properties: {
        block_name: { type: "string", description: "Block name" },
        days_ahead: { type: "integer", description: "Days to look ahead", default: 7 }
      },
      required: ["block_name"]
    },
    args: z.object({
      block_name: z.string().min(1),
      days_ahead: z.number().int().positive().max(90).default(7)
    }),
    result: z.object({
      block: z.string(),
      schedule_period_days: z.number(),
      schedule: z.array(z.object({
        date: z.string(),
        volume_barrels: z.number(),
        vessel: z.string(),
        destination: z.string()
      })),
      total_volume_barrels: z.number()
    }),
    handler: ({ block_name, days_ahead }) => {
      const [block] = lookup(fixtures.blocks, block_name, "block");
      const start = now().getTime();
      const schedule = fixtures.liftings
        .filter((l) => l.block === block && l.dayOffset < days_ahead)
        .sort((a, b) => a.dayOffset - b.dayOffset)
        .map((l) => ({
          date: isoDate(new Date(start + l.dayOffset * DAY_MS)),
          volume_barrels: l.volumeBarrels,
          vessel: l.vessel,
          destination: l.destination
        }));
      return {
        block,
        schedule_period_days: days_ahead,
        schedule,
        total_volume_barrels: schedule.reduce((sum, s) => sum + s.volume_barrels, 0)
      };
    }
  });

  const getWellStatus = defineCapability({
    name: "get_well_status",
    description: "Operational status of wells in a block; all wells unless specific IDs are given.",
    parameters: {
      type: "object",
      properties: {
        block_name: { type: "string", description: "Block name" },
        well_ids: { type: "array", items: { type: "string" }, description: "Optional well IDs" }
      },
      required: ["block_name"]
    },
    args: z.object({
      block_name: z.string().min(1),
      well_ids: z.array(z.string()).optional()
    }),
    result: z.object({
      block: z.string(),
      total_wells_queried: z.number(),
      wells: z.array(z.object({
        id: z.string(),
        status: z.string(),
        production_bopd: z.number().optional(),
        downtime_hours: z.number().optional()
      }))
    }),
    handler: ({ block_name, well_ids }) => {
      const [block, info] = lookup(fixtures.blocks, block_name, "block");
      const selected = well_ids && well_ids.length > 0
        ? well_ids.map((id) => info.wells.find((w) => w.id === id) ?? { id, status: "unknown" as const })
        : info.wells;
      const wells = selected.map((w) => ({
        id: w.id,
        status: w.status,
        ...("productionBopd" in w && w.productionBopd !== undefined && { production_bopd: w.productionBopd }),
        ...("downtimeHours" in w && w.downtimeHours !== undefined && { downtime_hours: w.downtimeHours })
      }));
      return { block, total_wells_queried: wells.length, wells };
    }
  });

  return [getProductionData, getLiftingSchedule, getWellStatus];
}
