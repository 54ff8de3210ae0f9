import type { DispatchParams } from "./types.js";

/**
 * Two-part diesel fuel curve: an idle term proportional to installed capacity
 * plus a marginal term proportional to output. Only charged for hours in which
 * the generator is dispatched.
 */
export const dieselFuelLitres = (
  dieselCapacityKw: number,
  outputKw: number,
  params: Pick<DispatchParams, "fuelCurveIdleCoeff" | "fuelCurveProportionalCoeff">
): number => dieselCapacityKw * params.fuelCurveIdleCoeff + outputKw * params.fuelCurveProportionalCoeff;

// Power-law cycle-life curve; shallow days are floored at a 10% effective depth
const MIN_EFFECTIVE_DEPTH = 0.1;

export const batteryWearIncrement = (
  dailyThroughput: number,
  dailyMaxDod: number,
  params: Pick<DispatchParams, "batteryDodMax" | "batteryCycleLifeCoeffA" | "batteryCycleLifeCoeffB">
): number =>
  dailyThroughput /
  (params.batteryCycleLifeCoeffA *
    Math.pow(Math.max(MIN_EFFECTIVE_DEPTH, dailyMaxDod * params.batteryDodMax), params.batteryCycleLifeCoeffB));
