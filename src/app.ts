import { Effect } from "effect";
import type { ClimateDataNotAvailableError, IClimateSeries } from "./climate/types.js";
import type { DispatchError, IDispatchEngine } from "./dispatch/index.js";
import type { DispatchResult } from "./dispatch/result.js";
import type { IEventLogger } from "./event-logger/types.js";
import { EventLogger } from "./event-logger/index.js";
import type { ClimateSeriesTooShortError } from "./errors/climate-series-too-short.error.js";

export type ReferenceIsland = {
  readonly name: string;
  readonly pvCapacityKw: number;
  readonly batteryCapacityKwh: number;
  readonly dieselCapacityKw: number;
  readonly annualDemandKwh: number;
};

// Typical configurations, from a 100-household atoll up to a capital-scale grid
export const REFERENCE_ISLANDS: readonly ReferenceIsland[] = [
  { name: "Small island (100 hh)", pvCapacityKw: 50, batteryCapacityKwh: 100, dieselCapacityKw: 30, annualDemandKwh: 200_000 },
  { name: "Medium island (500 hh)", pvCapacityKw: 300, batteryCapacityKwh: 600, dieselCapacityKw: 150, annualDemandKwh: 1_000_000 },
  { name: "Large island (2000 hh)", pvCapacityKw: 1_200, batteryCapacityKwh: 2_400, dieselCapacityKw: 600, annualDemandKwh: 4_000_000 },
  { name: "Solar-only (no diesel)", pvCapacityKw: 500, batteryCapacityKwh: 1_000, dieselCapacityKw: 0, annualDemandKwh: 500_000 },
  { name: "Diesel-only (no solar)", pvCapacityKw: 0, batteryCapacityKwh: 0, dieselCapacityKw: 200, annualDemandKwh: 500_000 },
  { name: "Capital-scale (constrained)", pvCapacityKw: 5_000, batteryCapacityKwh: 10_000, dieselCapacityKw: 50_000, annualDemandKwh: 200_000_000 },
];

export const DETAILED_CASE = "Medium island (500 hh)";

export type SweepResult = {
  readonly name: string;
  readonly result: DispatchResult;
};

export class App {
  public constructor(
    private readonly dispatchEngine: IDispatchEngine,
    private readonly climateSeries: IClimateSeries,
    private readonly eventLogger: IEventLogger = new EventLogger(),
    private readonly islands: readonly ReferenceIsland[] = REFERENCE_ISLANDS,
  ) { }

  public start(): Effect.Effect<
    readonly SweepResult[],
    DispatchError | ClimateDataNotAvailableError | ClimateSeriesTooShortError
  > {
    const deps = this;

    return Effect.gen(function* () {
      const { irradiance, temperature } = yield* deps.climateSeries.getHourlySeries();

      yield* deps.eventLogger.onSweepStart(deps.islands.length);

      const results = yield* Effect.forEach(deps.islands, (island) =>
        deps.dispatchEngine
          .run({
            pvCapacityKw: island.pvCapacityKw,
            batteryCapacityKwh: island.batteryCapacityKwh,
            dieselCapacityKw: island.dieselCapacityKw,
            annualDemandKwh: island.annualDemandKwh,
            irradiance,
            temperature,
          })
          .pipe(
            Effect.tap((result) => deps.eventLogger.onCaseSimulated(island.name, result)),
            Effect.map((result) => ({ name: island.name, result }))
          )
      );

      const detailed = results.find((entry) => entry.name === DETAILED_CASE);
      if (detailed) {
        yield* deps.eventLogger.onDetailedSummary(detailed.name, detailed.result);
      }

      return results;
    });
  }
}
