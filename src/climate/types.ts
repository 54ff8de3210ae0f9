import { Context, Data, Effect } from "effect";
import type { ClimateSeriesTooShortError } from "../errors/climate-series-too-short.error.js";

export type HourlyClimate = {
  readonly irradiance: readonly number[]; // W/m², 8760 values
  readonly temperature: readonly number[]; // °C, 8760 values
};

export class ClimateDataNotAvailableError extends Data.TaggedError("ClimateDataNotAvailable")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ClimateSeries extends Context.Tag("ClimateSeries")<
  ClimateSeries,
  {
    readonly getHourlySeries: () => Effect.Effect<
      HourlyClimate,
      ClimateDataNotAvailableError | ClimateSeriesTooShortError
    >;
  }
>() {}

export type IClimateSeries = Context.Tag.Service<typeof ClimateSeries>;
