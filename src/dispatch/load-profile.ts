import { Effect } from "effect";
import { InvalidLoadShapeError } from "../errors/invalid-load-shape.error.js";
import { InvalidSimulationInputError } from "../errors/invalid-simulation-input.error.js";
import { DAYS_PER_YEAR, HOURS_PER_DAY, HOURS_PER_YEAR } from "./constants.js";

// Tier-5 household demand curve, share of daily demand per hour (00:00 .. 23:00)
export const TIER5_LOAD_SHAPE: readonly number[] = Object.freeze([
  0.021008403, 0.021008403, 0.021008403, 0.021008403, // 00-03
  0.027310924, 0.037815126, 0.042016807, 0.042016807, // 04-07
  0.042016807, 0.042016807, 0.042016807, 0.042016807, // 08-11
  0.042016807, 0.042016807, 0.042016807, 0.042016807, // 12-15
  0.046218487, 0.050420168, 0.067226891, 0.084033613, // 16-19
  0.073529412, 0.052521008, 0.033613445, 0.023109244, // 20-23
]);

export const LOAD_SHAPE_TOLERANCE = 1e-6;

export const validateLoadShape = (
  shape: readonly number[]
): Effect.Effect<readonly number[], InvalidLoadShapeError> => {
  if (shape.length !== HOURS_PER_DAY) {
    return Effect.fail(
      new InvalidLoadShapeError({
        message: `Load shape must have ${HOURS_PER_DAY} values, got ${shape.length}`,
      })
    );
  }

  const badHour = shape.findIndex((value) => !Number.isFinite(value) || value < 0);
  if (badHour !== -1) {
    return Effect.fail(
      new InvalidLoadShapeError({
        message: `Load shape value at hour ${badHour} must be a finite non-negative number, got ${shape[badHour]}`,
      })
    );
  }

  const total = shape.reduce((sum, value) => sum + value, 0);
  if (Math.abs(total - 1) > LOAD_SHAPE_TOLERANCE) {
    return Effect.fail(
      new InvalidLoadShapeError({
        message: `Load shape must sum to 1.0 (±${LOAD_SHAPE_TOLERANCE}), got ${total}`,
      })
    );
  }

  return Effect.succeed(shape);
};

/**
 * Tiles a 24-hour shape across 365 identical days. No validation, callers
 * are expected to have run {@link validateLoadShape} first.
 */
export const expandLoadShape = (
  annualDemandKwh: number,
  shape: readonly number[] = TIER5_LOAD_SHAPE
): number[] => {
  const dailyDemandKwh = annualDemandKwh / DAYS_PER_YEAR;
  const profile = new Array<number>(HOURS_PER_YEAR);

  for (let hour = 0; hour < HOURS_PER_YEAR; hour++) {
    profile[hour] = (shape[hour % HOURS_PER_DAY] ?? 0) * dailyDemandKwh;
  }

  return profile;
};

export const buildLoadProfile = (
  annualDemandKwh: number,
  shape: readonly number[] = TIER5_LOAD_SHAPE
): Effect.Effect<number[], InvalidLoadShapeError | InvalidSimulationInputError> =>
  Effect.gen(function* () {
    if (!Number.isFinite(annualDemandKwh) || annualDemandKwh <= 0) {
      return yield* Effect.fail(
        new InvalidSimulationInputError({
          field: "annualDemandKwh",
          message: `Annual demand must be a positive number of kWh, got ${annualDemandKwh}`,
        })
      );
    }

    const validShape = yield* validateLoadShape(shape);
    return expandLoadShape(annualDemandKwh, validShape);
  });
