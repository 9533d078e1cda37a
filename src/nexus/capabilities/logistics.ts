import { z } from "zod";
import { defineCapability, type CapabilityDefinition } from "./types.js";
import { lookup, type Fixtures } from "./fixtures.js";

type RiskLevel = "low" | "moderate" | "high";

export function assessSeaRisk(waveHeightMeters: number, windSpeedKnots: number): { riskLevel: RiskLevel; advice: string } {
  if (waveHeightMeters > 3.5 || windSpeedKnots > 30) {
    return { riskLevel: "high", advice: "Consider delaying departure. High waves and strong winds." };
  }
  if (waveHeightMeters > 2 || windSpeedKnots > 20) {
    return { riskLevel: "moderate", advice: "Proceed with caution. Expect speed reduction." };
  }
  return { riskLevel: "low", advice: "Normal sailing conditions." };
}

export function logisticsCapabilities(fixtures: Fixtures): CapabilityDefinition[] {
  const trackVessel = defineCapability({
    name: "track_vessel",
    description: "Position, speed, route and ETA of a tanker.",
    parameters: {
      type: "object",
      properties: {
        vessel_name: { type: "string", description: "Vessel name, e.g. MT Sentosa Prime" }
      },
      required: ["vessel_name"]
    },
    args: z.object({ vessel_name: z.string().min(1) }),
    result: z.object({
      vessel_name: z.string(),
      origin: z.string(),
      destination: z.string(),
      current_location: z.string(),
      current_position: z.object({ latitude: z.number(), longitude: z.number() }),
      speed_knots: z.number(),
      status: z.string(),
      cargo_volume_barrels: z.number(),
      eta_hours: z.number()
    }),
    handler: ({ vessel_name }) => {
      const [name, v] = lookup(fixtures.vessels, vessel_name, "vessel");
      return {
        vessel_name: name,
        origin: v.origin,
        destination: v.destination,
        current_location: v.currentLocation,
        current_position: v.position,
        speed_knots: v.speedKnots,
        status: v.status,
        cargo_volume_barrels: v.cargoVolumeBarrels,
        eta_hours: v.etaHours
      };
    }
  });

  const getWeatherForecast = defineCapability({
    name: "get_weather_forecast",
    description: "Sea conditions and navigation advice for a strait or shipping lane.",
    parameters: {
      type: "object",
      properties: {
        location: { type: "string", description: "Strait or sea, e.g. Selat Sunda" },
        hours_ahead: { type: "integer", description: "Forecast horizon in hours", default: 24 }
      },
      required: ["location"]
    },
    args: z.object({
      location: z.string().min(1),
      hours_ahead: z.number().int().positive().max(240).default(24)
    }),
    result: z.object({
      location: z.string(),
      forecast_period_hours: z.number(),
      wave_height_meters: z.number(),
      wind_speed_knots: z.number(),
      visibility_km: z.number(),
      risk_level: z.enum(["low", "moderate", "high"]),
      navigation_advice: z.string()
    }),
    handler: ({ location, hours_ahead }) => {
      const [name, w] = lookup(fixtures.weather, location, "location");
      const { riskLevel, advice } = assessSeaRisk(w.waveHeightMeters, w.windSpeedKnots);
      return {
        location: name,
        forecast_period_hours: hours_ahead,
        wave_height_meters: w.waveHeightMeters,
        wind_speed_knots: w.windSpeedKnots,
        visibility_km: w.visibilityKm,
        risk_level: riskLevel,
        navigation_advice: advice
      };
    }
  });

  const getDeliveryStatus = defineCapability({
    name: "get_delivery_status",
    description: "End-to-end status of a crude shipment from block to refinery.",
    parameters: {
      type: "object",
      properties: {
        shipment_id: { type: "string", description: "Shipment ID, e.g. SHP-2026-001" }
      },
      required: ["shipment_id"]
    },
    args: z.object({ shipment_id: z.string().min(1) }),
    result: z.object({
      shipment_id: z.string(),
      status: z.string(),
      progress_percentage: z.number(),
      origin_block: z.string(),
      destination_refinery: z.string(),
      vessel_assigned: z.string(),
      volume_barrels: z.number()
    }),
    handler: ({ shipment_id }) => {
      const [id, s] = lookup(fixtures.shipments, shipment_id, "shipment");
      return {
        shipment_id: id,
        status: s.status,
        progress_percentage: s.progressPercentage,
        origin_block: s.originBlock,
        destination_refinery: s.destinationRefinery,
        vessel_assigned: s.vesselAssigned,
        volume_barrels: s.volumeBarrels
      };
    }
  });

  return [trackVessel, getWeatherForecast, getDeliveryStatus];
}
