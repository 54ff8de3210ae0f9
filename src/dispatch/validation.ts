import { Effect, Schema } from "effect";
import { ClimateSeriesTooShortError } from "../errors/climate-series-too-short.error.js";
import { InvalidDispatchParamsError } from "../errors/invalid-dispatch-params.error.js";
import { InvalidLoadShapeError } from "../errors/invalid-load-shape.error.js";
import { InvalidSimulationInputError } from "../errors/invalid-simulation-input.error.js";
import { HOURS_PER_YEAR } from "./constants.js";
import { validateLoadShape } from "./load-profile.js";
import type { DispatchParams, SimulationInputs } from "./types.js";

const Fraction = Schema.Number.pipe(Schema.between(0, 1));
const Efficiency = Schema.Number.pipe(Schema.greaterThan(0), Schema.lessThanOrEqualTo(1));
const NonNegative = Schema.Number.pipe(Schema.finite(), Schema.nonNegative());

export const DispatchParamsSchema = Schema.Struct({
  pvTempDeratingCoeff: NonNegative,
  pvNoctCoeff: NonNegative,
  pvSystemDeratingFactor: Fraction,
  batteryDodMax: Fraction,
  batteryChargeEfficiency: Efficiency,
  batteryDischargeEfficiency: Efficiency,
  batterySelfDischargeRate: Fraction,
  batteryCycleLifeCoeffA: Schema.Number.pipe(Schema.finite(), Schema.greaterThan(0)),
  batteryCycleLifeCoeffB: Schema.Number.pipe(Schema.finite()),
  batteryInitialSoc: Fraction,
  dieselMinLoadFraction: Fraction,
  fuelCurveIdleCoeff: NonNegative,
  fuelCurveProportionalCoeff: NonNegative,
  breakHour: Schema.Int.pipe(Schema.between(0, 23)),
  availableEnergyBasis: Schema.Literal("state-of-charge", "above-floor"),
});

export const validateDispatchParams = (
  params: unknown
): Effect.Effect<DispatchParams, InvalidDispatchParamsError> =>
  Schema.decodeUnknown(DispatchParamsSchema)(params).pipe(
    Effect.mapError((cause) => new InvalidDispatchParamsError({ message: cause.message, cause }))
  );

const requireNonNegative = (field: string, value: number) =>
  Number.isFinite(value) && value >= 0
    ? Effect.void
    : Effect.fail(
        new InvalidSimulationInputError({
          field,
          message: `${field} must be a finite non-negative number, got ${value}`,
        })
      );

const requireClimateSeries = (series: "irradiance" | "temperature", values: readonly number[]) =>
  Effect.gen(function* () {
    if (values.length < HOURS_PER_YEAR) {
      return yield* Effect.fail(
        new ClimateSeriesTooShortError({
          series,
          length: values.length,
          required: HOURS_PER_YEAR,
          message: `${series} series has ${values.length} hourly values, expected at least ${HOURS_PER_YEAR}`,
        })
      );
    }

    // Trailing entries past one year are never read, so they are not checked either
    for (let hour = 0; hour < HOURS_PER_YEAR; hour++) {
      const value = values[hour];
      if (value === undefined || !Number.isFinite(value)) {
        return yield* Effect.fail(
          new InvalidSimulationInputError({
            field: series,
            message: `${series} value at hour ${hour} is not a finite number: ${value}`,
          })
        );
      }
    }
  });

export const validateSimulationInputs = (
  inputs: SimulationInputs
): Effect.Effect<
  SimulationInputs,
  InvalidSimulationInputError | InvalidDispatchParamsError | InvalidLoadShapeError | ClimateSeriesTooShortError
> =>
  Effect.gen(function* () {
    yield* requireNonNegative("pvCapacityKw", inputs.pvCapacityKw);
    yield* requireNonNegative("batteryCapacityKwh", inputs.batteryCapacityKwh);
    yield* requireNonNegative("dieselCapacityKw", inputs.dieselCapacityKw);

    if (!Number.isFinite(inputs.annualDemandKwh) || inputs.annualDemandKwh <= 0) {
      return yield* Effect.fail(
        new InvalidSimulationInputError({
          field: "annualDemandKwh",
          message: `Annual demand must be a positive number of kWh, got ${inputs.annualDemandKwh}`,
        })
      );
    }

    yield* requireClimateSeries("irradiance", inputs.irradiance);
    yield* requireClimateSeries("temperature", inputs.temperature);

    if (inputs.loadShape !== undefined) {
      yield* validateLoadShape(inputs.loadShape);
    }

    const params = yield* validateDispatchParams(inputs.params);
    return { ...inputs, params };
  });
