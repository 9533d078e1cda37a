import { z } from "zod";
import { defineCapability, type CapabilityDefinition } from "./types.js";
import { findEntry, lookup, round2, type Fixtures } from "./fixtures.js";

const COST_SHARES = { labor: 0.35, maintenance: 0.25, energy: 0.2, other: 0.2 } as const;

export function profitabilityAssessment(marginPercentage: number): string {
  if (marginPercentage > 70) return "Excellent - highly profitable operation";
  if (marginPercentage > 50) return "Good - healthy profit margin";
  if (marginPercentage > 30) return "Moderate - acceptable profitability";
  return "Low - requires cost optimization";
}

export function financeCapabilities(fixtures: Fixtures): CapabilityDefinition[] {
  const calculateRevenueImpact = defineCapability({
    name: "calculate_revenue_impact",
    description: "Revenue in USD and IDR for a crude volume at a given price per barrel.",
    parameters: {
      type: "object",
      properties: {
        oil_volume_barrels: { type: "number", description: "Volume in barrels" },
        oil_price_usd: { type: "number", description: "Price per barrel in USD", default: fixtures.benchmarkPriceUsd }
      },
      required: ["oil_volume_barrels"]
    },
    args: z.object({
      oil_volume_barrels: z.number().nonnegative(),
      oil_price_usd: z.number().positive().default(fixtures.benchmarkPriceUsd)
    }),
    result: z.object({
      volume_barrels: z.number(),
      price_per_barrel_usd: z.number(),
      total_revenue_usd: z.number(),
      total_revenue_idr: z.number(),
      exchange_rate: z.number()
    }),
    handler: ({ oil_volume_barrels, oil_price_usd }) => {
      const revenueUsd = oil_volume_barrels * oil_price_usd;
      return {
        volume_barrels: oil_volume_barrels,
        price_per_barrel_usd: oil_price_usd,
        total_revenue_usd: round2(revenueUsd),
        total_revenue_idr: round2(revenueUsd * fixtures.exchangeRateUsdIdr),
        exchange_rate: fixtures.exchangeRateUsdIdr
      };
    }
  });

  const analyzeOperationalCost = defineCapability({
    name: "analyze_operational_cost",
    description: "Daily operating cost and its breakdown for a block at a production rate.",
    parameters: {
      type: "object",
      properties: {
        block_name: { type: "string", description: "Block name" },
        production_volume_bopd: { type: "number", description: "Production in barrels of oil per day" }
      },
      required: ["block_name", "production_volume_bopd"]
    },
    args: z.object({
      block_name: z.string().min(1),
      production_volume_bopd: z.number().nonnegative()
    }),
    result: z.object({
      block: z.string(),
      production_volume_bopd: z.number(),
      operating_cost_per_barrel_usd: z.number(),
      total_daily_cost_usd: z.number(),
      cost_breakdown: z.object({
        labor_usd: z.number(),
        maintenance_usd: z.number(),
        energy_usd: z.number(),
        other_usd: z.number()
      })
    }),
    handler: ({ block_name, production_volume_bopd }) => {
      // unlisted blocks are costed at the default rate
      const entry = findEntry(fixtures.blocks, block_name);
      const block = entry ? entry[0] : block_name.trim();
      const opex = entry ? entry[1].opexPerBarrelUsd : fixtures.defaultOpexPerBarrelUsd;
      const daily = production_volume_bopd * opex;
      return {
        block,
        production_volume_bopd,
        operating_cost_per_barrel_usd: opex,
        total_daily_cost_usd: round2(daily),
        cost_breakdown: {
          labor_usd: round2(daily * COST_SHARES.labor),
          maintenance_usd: round2(daily * COST_SHARES.maintenance),
          energy_usd: round2(daily * COST_SHARES.energy),
          other_usd: round2(daily * COST_SHARES.other)
        }
      };
    }
  });

  const calculateProfitability = defineCapability({
    name: "calculate_profitability",
    description: "Gross profit, margin and breakeven volume from revenue and operating cost.",
    parameters: {
      type: "object",
      properties: {
        revenue_usd: { type: "number", description: "Total revenue in USD" },
        operating_cost_usd: { type: "number", description: "Total operating cost in USD" }
      },
      required: ["revenue_usd", "operating_cost_usd"]
    },
    args: z.object({
      revenue_usd: z.number().nonnegative(),
      operating_cost_usd: z.number().nonnegative()
    }),
    result: z.object({
      revenue_usd: z.number(),
      operating_cost_usd: z.number(),
      gross_profit_usd: z.number(),
      profit_margin_percentage: z.number(),
      profitability_assessment: z.string(),
      breakeven_volume_barrels: z.number()
    }),
    handler: ({ revenue_usd, operating_cost_usd }) => {
      const gross = revenue_usd - operating_cost_usd;
      const margin = revenue_usd > 0 ? (gross / revenue_usd) * 100 : 0;
      return {
        revenue_usd: round2(revenue_usd),
        operating_cost_usd: round2(operating_cost_usd),
        gross_profit_usd: round2(gross),
        profit_margin_percentage: round2(margin),
        profitability_assessment: profitabilityAssessment(margin),
        breakeven_volume_barrels: Math.round(operating_cost_usd / fixtures.benchmarkPriceUsd)
      };
    }
  });

  const getMarketPriceTrends = defineCapability({
    name: "get_market_price_trends",
    description: "Current price and 30-day trend for crude oil or natural gas.",
    parameters: {
      type: "object",
      properties: {
        commodity: { type: "string", enum: ["crude_oil", "natural_gas"], default: "crude_oil" }
      },
      required: []
    },
    args: z.object({ commodity: z.enum(["crude_oil", "natural_gas"]).default("crude_oil") }),
    result: z.object({
      commodity: z.string(),
      current_price_usd: z.number(),
      price_30_days_ago_usd: z.number(),
      price_change_percentage: z.number(),
      trend: z.enum(["upward", "downward", "flat"]),
      volatility: z.string(),
      forecast_outlook: z.string()
    }),
    handler: ({ commodity }) => {
      const [name, p] = lookup(fixtures.prices, commodity, "commodity");
      const change = ((p.currentUsd - p.thirtyDaysAgoUsd) / p.thirtyDaysAgoUsd) * 100;
      const trend: "upward" | "downward" | "flat" = p.currentUsd > p.thirtyDaysAgoUsd ? "upward" : p.currentUsd < p.thirtyDaysAgoUsd ? "downward" : "flat";
      return {
        commodity: name,
        current_price_usd: round2(p.currentUsd),
        price_30_days_ago_usd: round2(p.thirtyDaysAgoUsd),
        price_change_percentage: round2(change),
        trend,
        volatility: p.volatility,
        forecast_outlook: p.outlook
      };
    }
  });

  return [calculateRevenueImpact, analyzeOperationalCost, calculateProfitability, getMarketPriceTrends];
}
