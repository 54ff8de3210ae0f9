import type { DispatchBand, DispatchParams } from "./types.js";

// Fixed band edges of the reference doctrine; only the break hour is configurable
const MORNING_EDGE_HOUR = 4;
const LATE_EVENING_HOUR = 23;

export type DieselDecisionInput = {
  readonly hourOfDay: number;
  readonly netLoadKwh: number; // > 0, deficit left after PV
  readonly batteryAvailableKwh: number;
  readonly batteryHeadroomKwh: number;
  readonly dieselCapacityKw: number;
};

type PolicyParams = Pick<DispatchParams, "breakHour" | "dieselMinLoadFraction" | "batteryChargeEfficiency">;

export const dispatchBand = (hourOfDay: number, breakHour: number): DispatchBand => {
  if (hourOfDay > MORNING_EDGE_HOUR && hourOfDay <= breakHour) {
    return "daytime";
  }
  if (hourOfDay > breakHour && hourOfDay < LATE_EVENING_HOUR) {
    return "evening-peak";
  }
  return "night";
};

// Diesel that can serve the deficit and refill the battery in the same hour
export const maximumUsefulDieselKw = (
  netLoadKwh: number,
  batteryHeadroomKwh: number,
  dieselCapacityKw: number,
  chargeEfficiency: number
): number => Math.min(dieselCapacityKw, netLoadKwh + batteryHeadroomKwh / chargeEfficiency);

/**
 * Decision table evaluated fresh every deficit hour:
 *
 * | band         | runs when                         | output                          |
 * |--------------|-----------------------------------|---------------------------------|
 * | daytime      | battery cannot cover the deficit  | max(min load, deficit), ≤ rated |
 * | evening-peak | useful output exceeds min load    | useful output                   |
 * | night        | battery cannot cover the deficit  | max(min load, useful output)    |
 *
 * A running generator is never dispatched below its minimum load.
 */
export const decideDieselOutput = (input: DieselDecisionInput, params: PolicyParams): number => {
  const { hourOfDay, netLoadKwh, batteryAvailableKwh, batteryHeadroomKwh, dieselCapacityKw } = input;
  const minimumLoadKw = params.dieselMinLoadFraction * dieselCapacityKw;
  const usefulKw = maximumUsefulDieselKw(
    netLoadKwh,
    batteryHeadroomKwh,
    dieselCapacityKw,
    params.batteryChargeEfficiency
  );

  let outputKw = 0;

  switch (dispatchBand(hourOfDay, params.breakHour)) {
    case "daytime":
      if (netLoadKwh > batteryAvailableKwh) {
        outputKw = Math.min(dieselCapacityKw, Math.max(minimumLoadKw, netLoadKwh));
      }
      break;
    case "evening-peak":
      if (usefulKw > minimumLoadKw) {
        outputKw = usefulKw;
      }
      break;
    case "night":
      if (batteryAvailableKwh < netLoadKwh) {
        outputKw = Math.max(minimumLoadKw, usefulKw);
      }
      break;
  }

  if (outputKw > 0 && outputKw < minimumLoadKw) {
    outputKw = minimumLoadKw;
  }

  return outputKw;
};
