import { Context, Effect, Layer } from "effect";
import type { ConfigError } from "effect/ConfigError";
import { DispatchParamsConfig } from "../config.js";
import type { ClimateSeriesTooShortError } from "../errors/climate-series-too-short.error.js";
import type { InvalidDispatchParamsError } from "../errors/invalid-dispatch-params.error.js";
import type { InvalidLoadShapeError } from "../errors/invalid-load-shape.error.js";
import type { InvalidSimulationInputError } from "../errors/invalid-simulation-input.error.js";
import type { DispatchResult } from "./result.js";
import { simulateYear } from "./simulation.js";
import type { DispatchParams, SimulationInputs } from "./types.js";
import { validateDispatchParams, validateSimulationInputs } from "./validation.js";

export type {
  AvailableEnergyBasis,
  BatteryState,
  DispatchBand,
  DispatchParams,
  HourOutcome,
  SimulationAccumulators,
  SimulationInputs,
} from "./types.js";
export { DispatchResult, type DispatchResultFields, type DispatchSummary } from "./result.js";
export { BatteryStateTracker } from "./battery-state-tracker.js";
export { TIER5_LOAD_SHAPE, buildLoadProfile, expandLoadShape, validateLoadShape } from "./load-profile.js";
export { cellTemperature, pvOutputKw, temperatureDerating } from "./generation.js";
export { decideDieselOutput, dispatchBand, maximumUsefulDieselKw } from "./policy.js";
export { batteryWearIncrement, dieselFuelLitres } from "./fuel-and-wear.js";
export { createAccumulators, dispatchHour, simulateYear } from "./simulation.js";
export { DispatchParamsSchema, validateDispatchParams, validateSimulationInputs } from "./validation.js";

export type DispatchError =
  | InvalidSimulationInputError
  | InvalidDispatchParamsError
  | InvalidLoadShapeError
  | ClimateSeriesTooShortError;

export const runDispatch = (inputs: SimulationInputs): Effect.Effect<DispatchResult, DispatchError> =>
  Effect.gen(function* () {
    const validInputs = yield* validateSimulationInputs(inputs);
    const result = simulateYear(validInputs);

    yield* Effect.logDebug("Dispatch year simulated", result.summary());

    return result;
  }).pipe(
    Effect.annotateLogs({
      pvKw: inputs.pvCapacityKw,
      batteryKwh: inputs.batteryCapacityKwh,
      dieselKw: inputs.dieselCapacityKw,
    }),
    Effect.withSpan("dispatch.runDispatch")
  );

export type DispatchRequest = Omit<SimulationInputs, "params"> & {
  readonly params?: Partial<DispatchParams>;
};

export class DispatchEngine extends Context.Tag("DispatchEngine")<
  DispatchEngine,
  {
    readonly params: DispatchParams;
    readonly run: (request: DispatchRequest) => Effect.Effect<DispatchResult, DispatchError>;
  }
>() {}

export const DispatchEngineLayer: Layer.Layer<DispatchEngine, ConfigError | InvalidDispatchParamsError> = Layer.effect(
  DispatchEngine,
  Effect.gen(function* () {
    const configured = yield* DispatchParamsConfig;
    const params = yield* validateDispatchParams(configured);

    yield* Effect.logInfo("Dispatch engine initialized", params);

    return DispatchEngine.of({
      params,
      run: (request) =>
        runDispatch({
          ...request,
          params: { ...params, ...request.params },
        }),
    });
  })
);

export type IDispatchEngine = Context.Tag.Service<typeof DispatchEngine>;
