import { BatteryStateTracker } from "./battery-state-tracker.js";
import { HOURS_PER_DAY, HOURS_PER_YEAR, UNMET_TOLERANCE_KWH } from "./constants.js";
import { dieselFuelLitres } from "./fuel-and-wear.js";
import { pvOutputKw } from "./generation.js";
import { expandLoadShape, TIER5_LOAD_SHAPE } from "./load-profile.js";
import { decideDieselOutput, dispatchBand } from "./policy.js";
import { toDispatchResult, type DispatchResult } from "./result.js";
import type { DispatchParams, HourOutcome, SimulationAccumulators, SimulationInputs } from "./types.js";

export type HourStep = {
  readonly hourIndex: number;
  readonly demandKwh: number;
  readonly irradianceWm2: number;
  readonly ambientC: number;
  readonly pvCapacityKw: number;
  readonly dieselCapacityKw: number;
};

export type SimulateYearOptions = {
  readonly onHour?: (outcome: HourOutcome) => void;
};

export const createAccumulators = (): SimulationAccumulators => ({
  pvGenerationKwh: 0,
  dieselGenerationKwh: 0,
  batteryDischargeKwh: 0,
  curtailmentKwh: 0,
  unmetDemandKwh: 0,
  dieselSpillKwh: 0,
  fuelLitres: 0,
  dieselHours: 0,
  unmetHours: 0,
  curtailmentHours: 0,
  socSum: 0,
  maxDod: 0,
});

/**
 * Advances the microgrid by one hour. Mutates the battery and the
 * accumulators, and returns where every kWh of the hour went.
 */
export const dispatchHour = (
  step: HourStep,
  battery: BatteryStateTracker,
  totals: SimulationAccumulators,
  params: DispatchParams
): HourOutcome => {
  const hourOfDay = step.hourIndex % HOURS_PER_DAY;

  const selfDischargeKwh = battery.applySelfDischarge();

  const pvKwh = pvOutputKw(step.pvCapacityKw, step.irradianceWm2, step.ambientC, params);
  totals.pvGenerationKwh += pvKwh;

  const netLoadKwh = step.demandKwh - pvKwh;

  let band: HourOutcome["band"] = null;
  let pvToLoadKwh = pvKwh;
  let pvToBatteryKwh = 0;
  let curtailedKwh = 0;
  let dieselKwh = 0;
  let dieselToLoadKwh = 0;
  let dieselToBatteryKwh = 0;
  let dieselSpillKwh = 0;
  let batteryDischargeKwh = 0;
  let floorRestoredKwh = 0;
  let unmetKwh = 0;
  let fuelLitres = 0;

  if (netLoadKwh <= 0) {
    const { absorbedKwh, rejectedKwh } = battery.charge(-netLoadKwh);
    pvToLoadKwh = step.demandKwh;
    pvToBatteryKwh = absorbedKwh;

    if (rejectedKwh > 0) {
      curtailedKwh = rejectedKwh;
      totals.curtailmentKwh += rejectedKwh;
      totals.curtailmentHours++;
    }
  } else {
    band = dispatchBand(hourOfDay, params.breakHour);

    dieselKwh = decideDieselOutput(
      {
        hourOfDay,
        netLoadKwh,
        batteryAvailableKwh:
          params.availableEnergyBasis === "above-floor" ? battery.usableEnergyKwh : battery.storedEnergyKwh,
        batteryHeadroomKwh: battery.headroomKwh,
        dieselCapacityKw: step.dieselCapacityKw,
      },
      params
    );

    if (dieselKwh > 0) {
      fuelLitres = dieselFuelLitres(step.dieselCapacityKw, dieselKwh, params);
      totals.fuelLitres += fuelLitres;
      totals.dieselGenerationKwh += dieselKwh;
      totals.dieselHours++;
    }

    const remainingKwh = netLoadKwh - dieselKwh;

    if (remainingKwh > 0) {
      dieselToLoadKwh = dieselKwh;

      const { deliveredKwh, shortfallKwh, floorRestoredKwh: restoredKwh } = battery.discharge(remainingKwh);
      batteryDischargeKwh = deliveredKwh;
      floorRestoredKwh = restoredKwh;
      totals.batteryDischargeKwh += deliveredKwh;

      if (shortfallKwh > UNMET_TOLERANCE_KWH) {
        unmetKwh = shortfallKwh;
        totals.unmetDemandKwh += shortfallKwh;
        totals.unmetHours++;
      }
    } else {
      dieselToLoadKwh = netLoadKwh;

      if (remainingKwh < 0) {
        const { absorbedKwh, rejectedKwh } = battery.charge(-remainingKwh);
        dieselToBatteryKwh = absorbedKwh;
        dieselSpillKwh = rejectedKwh;
        totals.dieselSpillKwh += rejectedKwh;
      }
    }
  }

  const soc = battery.soc;
  totals.socSum += soc;
  totals.maxDod = Math.max(totals.maxDod, 1 - soc);
  battery.recordDepth();

  if (hourOfDay === HOURS_PER_DAY - 1) {
    battery.closeDay();
  }

  return {
    hourIndex: step.hourIndex,
    hourOfDay,
    band,
    demandKwh: step.demandKwh,
    pvKwh,
    pvToLoadKwh,
    pvToBatteryKwh,
    curtailedKwh,
    dieselKwh,
    dieselToLoadKwh,
    dieselToBatteryKwh,
    dieselSpillKwh,
    batteryDischargeKwh,
    selfDischargeKwh,
    floorRestoredKwh,
    unmetKwh,
    fuelLitres,
    soc,
  };
};

/**
 * Simulates one year of hourly dispatch. Inputs are assumed valid; use
 * `runDispatch` for the validated entry point.
 */
export const simulateYear = (inputs: SimulationInputs, options: SimulateYearOptions = {}): DispatchResult => {
  const { params } = inputs;
  const load = expandLoadShape(inputs.annualDemandKwh, inputs.loadShape ?? TIER5_LOAD_SHAPE);
  const battery = new BatteryStateTracker(inputs.batteryCapacityKwh, params, params.batteryInitialSoc);
  const totals = createAccumulators();

  for (let hourIndex = 0; hourIndex < HOURS_PER_YEAR; hourIndex++) {
    const outcome = dispatchHour(
      {
        hourIndex,
        demandKwh: load[hourIndex] ?? 0,
        irradianceWm2: inputs.irradiance[hourIndex] ?? 0,
        ambientC: inputs.temperature[hourIndex] ?? 0,
        pvCapacityKw: inputs.pvCapacityKw,
        dieselCapacityKw: inputs.dieselCapacityKw,
      },
      battery,
      totals,
      params
    );
    options.onHour?.(outcome);
  }

  return toDispatchResult(inputs, totals, battery.wearCycles);
};
