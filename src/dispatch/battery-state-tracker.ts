import { batteryWearIncrement } from "./fuel-and-wear.js";
import type { BatteryState, DispatchParams } from "./types.js";

export type ChargeOutcome = {
  readonly absorbedKwh: number;
  readonly rejectedKwh: number;
};

export type DischargeOutcome = {
  readonly deliveredKwh: number;
  readonly shortfallKwh: number; // includes floorRestoredKwh
  readonly floorRestoredKwh: number;
};

type BatteryParams = Pick<
  DispatchParams,
  | "batteryDodMax"
  | "batteryChargeEfficiency"
  | "batteryDischargeEfficiency"
  | "batterySelfDischargeRate"
  | "batteryCycleLifeCoeffA"
  | "batteryCycleLifeCoeffB"
>;

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Owns the state of charge of one battery bank for the duration of a
 * simulated year. Every operation reports the energy it actually moved,
 * which may be less than what was asked for.
 */
export class BatteryStateTracker {
  private readonly state: BatteryState;

  public constructor(
    private readonly capacityKwh: number,
    private readonly params: BatteryParams,
    initialSoc: number,
  ) {
    this.state = {
      soc: clampUnit(initialSoc),
      dailyThroughput: 0,
      dailyMaxDod: 0,
      wearCycles: 0,
    };
  }

  public get soc(): number {
    return this.state.soc;
  }

  public get socFloor(): number {
    return 1 - this.params.batteryDodMax;
  }

  public get wearCycles(): number {
    return this.state.wearCycles;
  }

  public get hasCapacity(): boolean {
    return this.capacityKwh > 0;
  }

  // Energy deliverable if the whole state of charge were drawn
  public get storedEnergyKwh(): number {
    return this.hasCapacity ? this.state.soc * this.capacityKwh * this.params.batteryDischargeEfficiency : 0;
  }

  // Energy deliverable before hitting the depth-of-discharge floor
  public get usableEnergyKwh(): number {
    return this.hasCapacity
      ? Math.max(0, this.state.soc - this.socFloor) * this.capacityKwh * this.params.batteryDischargeEfficiency
      : 0;
  }

  public get headroomKwh(): number {
    return this.hasCapacity ? (1 - this.state.soc) * this.capacityKwh : 0;
  }

  public snapshot(): BatteryState {
    return { ...this.state };
  }

  public applySelfDischarge(): number {
    const lostFraction = this.state.soc * this.params.batterySelfDischargeRate;
    this.state.dailyThroughput += lostFraction;
    this.state.soc = clampUnit(this.state.soc - lostFraction);
    return lostFraction * this.capacityKwh;
  }

  public charge(requestedKwh: number): ChargeOutcome {
    if (!this.hasCapacity || requestedKwh <= 0) {
      return { absorbedKwh: 0, rejectedKwh: Math.max(0, requestedKwh) };
    }

    const efficiency = this.params.batteryChargeEfficiency;
    const absorbedKwh = Math.min(requestedKwh, Math.max(0, 1 - this.state.soc) * this.capacityKwh / efficiency);
    this.state.soc = clampUnit(this.state.soc + efficiency * absorbedKwh / this.capacityKwh);

    return { absorbedKwh, rejectedKwh: requestedKwh - absorbedKwh };
  }

  public discharge(requestedKwh: number): DischargeOutcome {
    if (!this.hasCapacity || requestedKwh <= 0) {
      return { deliveredKwh: 0, shortfallKwh: Math.max(0, requestedKwh), floorRestoredKwh: 0 };
    }

    const efficiency = this.params.batteryDischargeEfficiency;
    const floor = this.socFloor;

    const deliveredKwh = Math.min(requestedKwh, this.usableEnergyKwh);
    const drawnFraction = deliveredKwh / (efficiency * this.capacityKwh);
    this.state.soc -= drawnFraction;
    this.state.dailyThroughput += drawnFraction;

    // Self-discharge or rounding can leave the bank under its floor. The bank is
    // restored to the floor and the energy that takes is booked as unmet demand.
    let floorRestoredKwh = 0;
    if (this.state.soc < floor) {
      floorRestoredKwh = (floor - this.state.soc) * efficiency * this.capacityKwh;
      this.state.dailyThroughput -= floor - this.state.soc;
      this.state.soc = floor;
    }

    this.state.soc = clampUnit(this.state.soc);
    return {
      deliveredKwh,
      shortfallKwh: requestedKwh - deliveredKwh + floorRestoredKwh,
      floorRestoredKwh,
    };
  }

  public recordDepth(): void {
    this.state.dailyMaxDod = Math.max(this.state.dailyMaxDod, 1 - this.state.soc);
  }

  /**
   * Converts the day's throughput into equivalent wear cycles and starts a new day.
   */
  public closeDay(): number {
    const increment =
      this.hasCapacity && this.state.dailyMaxDod > 0
        ? batteryWearIncrement(this.state.dailyThroughput, this.state.dailyMaxDod, this.params)
        : 0;

    this.state.wearCycles += increment;
    this.state.dailyThroughput = 0;
    this.state.dailyMaxDod = 0;
    return increment;
  }
}
