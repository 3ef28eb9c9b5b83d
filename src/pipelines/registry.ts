/**
 * Pipeline registry – maps PipelineName values to extraction / transform classes.
 */
import type { PipelineDefinition } from "../core/etl.js";
import { UnsupportedPipelineError } from "../core/exceptions.js";
import { LeedsExtractionStrategy, LeedsTransformStrategy } from "./footfall/leeds.js";
import { YorkExtractionStrategy, YorkTransformStrategy } from "./footfall/york.js";
import {
  HolidaysExtractionStrategy,
  HolidaysTransformStrategy,
} from "./holidays/holidays.js";
import {
  ForecastExtractionStrategy,
  ForecastTransformStrategy,
} from "./weather/forecast.js";
import {
  HistoricExtractionStrategy,
  HistoricTransformStrategy,
} from "./weather/historic.js";

// ---------------------------------------------------------------------------
// Pipeline enum
// ---------------------------------------------------------------------------

export enum PipelineName {
  Holidays = "holidays",
  Forecast = "forecast",
  Historic = "historic",
  FootfallLeeds = "footfall-leeds",
  FootfallYork = "footfall-york",
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const PIPELINE_REGISTRY: Record<PipelineName, PipelineDefinition> = {
  [PipelineName.Holidays]: {
    description: "UK public holidays observed in England",
    extraction: HolidaysExtractionStrategy,
    transform: HolidaysTransformStrategy,
  },
  [PipelineName.Forecast]: {
    description: "Daily weather forecast per city",
    extraction: ForecastExtractionStrategy,
    transform: ForecastTransformStrategy,
  },
  [PipelineName.Historic]: {
    description: "Hourly observed weather per city for one day",
    extraction: HistoricExtractionStrategy,
    transform: HistoricTransformStrategy,
  },
  [PipelineName.FootfallLeeds]: {
    description: "Leeds city-centre hourly footfall",
    extraction: LeedsExtractionStrategy,
    transform: LeedsTransformStrategy,
  },
  [PipelineName.FootfallYork]: {
    description: "York city-centre footfall",
    extraction: YorkExtractionStrategy,
    transform: YorkTransformStrategy,
  },
};

export function isPipelineName(name: string): name is PipelineName {
  return Object.values<string>(PipelineName).includes(name);
}

export function getPipelineDefinition(name: string): PipelineDefinition {
  if (!isPipelineName(name)) {
    throw new UnsupportedPipelineError(`Unknown pipeline: ${name}`);
  }
  return PIPELINE_REGISTRY[name];
}
