import { Data } from "effect";
import { DAYS_PER_YEAR, HOURS_PER_YEAR } from "./constants.js";
import type { SimulationAccumulators } from "./types.js";

export type DispatchResultFields = {
  readonly pvCapacityKw: number;
  readonly batteryCapacityKwh: number;
  readonly dieselCapacityKw: number;
  readonly annualDemandKwh: number;

  readonly pvGenerationKwh: number;
  readonly dieselGenerationKwh: number;
  readonly batteryDischargeKwh: number;
  readonly curtailmentKwh: number;
  readonly unmetDemandKwh: number;
  readonly dieselSpillKwh: number; // diesel overshoot the battery could not absorb
  readonly fuelLitres: number;

  readonly dieselHours: number;
  readonly unmetHours: number;
  readonly curtailmentHours: number;

  readonly avgSoc: number;
  readonly maxDod: number;
  readonly batteryCycles: number; // equivalent full cycles from discharge throughput
  readonly batteryWearCycles: number; // cycle-life weighted wear
};

export type DispatchSummary = {
  readonly pvKw: number;
  readonly batteryKwh: number;
  readonly dieselKw: number;
  readonly demandKwh: number;
  readonly pvGenKwh: number;
  readonly dieselGenKwh: number;
  readonly curtailmentKwh: number;
  readonly unmetKwh: number;
  readonly fuelLitres: number;
  readonly effectiveCf: number;
  readonly curtailmentPct: number;
  readonly dieselShare: number;
  readonly lpsp: number;
  readonly dieselHours: number;
  readonly unmetHours: number;
  readonly batteryCycles: number;
};

const ratio = (numerator: number, denominator: number): number =>
  denominator > 0 ? numerator / denominator : 0;

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export class DispatchResult extends Data.Class<DispatchResultFields> {
  // PV capacity factor after curtailment
  public get effectivePvCapacityFactor(): number {
    return ratio(this.pvGenerationKwh, this.pvCapacityKw * HOURS_PER_YEAR);
  }

  public get curtailmentFraction(): number {
    return ratio(this.curtailmentKwh, this.pvGenerationKwh + this.curtailmentKwh);
  }

  public get dieselShare(): number {
    return ratio(this.dieselGenerationKwh, this.pvGenerationKwh + this.dieselGenerationKwh);
  }

  // Loss of power supply probability
  public get lpsp(): number {
    return ratio(this.unmetDemandKwh, this.annualDemandKwh);
  }

  // Discharge against one full cycle per day
  public get batteryUtilisation(): number {
    return ratio(this.batteryDischargeKwh, this.batteryCapacityKwh * DAYS_PER_YEAR);
  }

  public summary(): DispatchSummary {
    return {
      pvKw: this.pvCapacityKw,
      batteryKwh: this.batteryCapacityKwh,
      dieselKw: this.dieselCapacityKw,
      demandKwh: this.annualDemandKwh,
      pvGenKwh: round(this.pvGenerationKwh, 1),
      dieselGenKwh: round(this.dieselGenerationKwh, 1),
      curtailmentKwh: round(this.curtailmentKwh, 1),
      unmetKwh: round(this.unmetDemandKwh, 1),
      fuelLitres: round(this.fuelLitres, 1),
      effectiveCf: round(this.effectivePvCapacityFactor, 4),
      curtailmentPct: round(this.curtailmentFraction, 4),
      dieselShare: round(this.dieselShare, 4),
      lpsp: round(this.lpsp, 4),
      dieselHours: this.dieselHours,
      unmetHours: this.unmetHours,
      batteryCycles: round(this.batteryCycles, 1),
    };
  }
}

export const toDispatchResult = (
  capacities: Pick<
    DispatchResultFields,
    "pvCapacityKw" | "batteryCapacityKwh" | "dieselCapacityKw" | "annualDemandKwh"
  >,
  accumulators: SimulationAccumulators,
  batteryWearCycles: number
): DispatchResult =>
  new DispatchResult({
    pvCapacityKw: capacities.pvCapacityKw,
    batteryCapacityKwh: capacities.batteryCapacityKwh,
    dieselCapacityKw: capacities.dieselCapacityKw,
    annualDemandKwh: capacities.annualDemandKwh,
    pvGenerationKwh: accumulators.pvGenerationKwh,
    dieselGenerationKwh: accumulators.dieselGenerationKwh,
    batteryDischargeKwh: accumulators.batteryDischargeKwh,
    curtailmentKwh: accumulators.curtailmentKwh,
    unmetDemandKwh: accumulators.unmetDemandKwh,
    dieselSpillKwh: accumulators.dieselSpillKwh,
    fuelLitres: accumulators.fuelLitres,
    dieselHours: accumulators.dieselHours,
    unmetHours: accumulators.unmetHours,
    curtailmentHours: accumulators.curtailmentHours,
    avgSoc: accumulators.socSum / HOURS_PER_YEAR,
    maxDod: accumulators.maxDod,
    batteryCycles: ratio(accumulators.batteryDischargeKwh, capacities.batteryCapacityKwh),
    batteryWearCycles,
  });
