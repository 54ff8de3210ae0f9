export type AvailableEnergyBasis = "state-of-charge" | "above-floor";

export type DispatchParams = {
  readonly pvTempDeratingCoeff: number; // power loss per °C of cell temperature above 25°C
  readonly pvNoctCoeff: number; // °C of cell temperature rise per kW/m² of irradiance
  readonly pvSystemDeratingFactor: number; // dust, mismatch, wiring
  readonly batteryDodMax: number; // depth-of-discharge ceiling, 0..1
  readonly batteryChargeEfficiency: number; // one-way
  readonly batteryDischargeEfficiency: number; // one-way
  readonly batterySelfDischargeRate: number; // fraction of SOC lost per hour
  readonly batteryCycleLifeCoeffA: number;
  readonly batteryCycleLifeCoeffB: number;
  readonly batteryInitialSoc: number;
  readonly dieselMinLoadFraction: number; // of rated capacity
  readonly fuelCurveIdleCoeff: number; // l/h per kW installed
  readonly fuelCurveProportionalCoeff: number; // l/kWh generated
  readonly breakHour: number; // 0-23, end of the daytime band
  readonly availableEnergyBasis: AvailableEnergyBasis;
};

export type SimulationInputs = {
  readonly pvCapacityKw: number;
  readonly batteryCapacityKwh: number;
  readonly dieselCapacityKw: number;
  readonly annualDemandKwh: number;
  readonly irradiance: readonly number[]; // W/m², hourly
  readonly temperature: readonly number[]; // °C, hourly
  readonly loadShape?: readonly number[]; // 24 values summing to 1
  readonly params: DispatchParams;
};

export type BatteryState = {
  soc: number;
  dailyThroughput: number; // SOC fractions moved since the last day boundary
  dailyMaxDod: number;
  wearCycles: number;
};

export type SimulationAccumulators = {
  pvGenerationKwh: number;
  dieselGenerationKwh: number;
  batteryDischargeKwh: number;
  curtailmentKwh: number;
  unmetDemandKwh: number;
  dieselSpillKwh: number;
  fuelLitres: number;
  dieselHours: number;
  unmetHours: number;
  curtailmentHours: number;
  socSum: number;
  maxDod: number;
};

export type DispatchBand = "daytime" | "evening-peak" | "night";

export type HourOutcome = {
  readonly hourIndex: number;
  readonly hourOfDay: number;
  readonly band: DispatchBand | null; // null in surplus hours, no decision is taken
  readonly demandKwh: number;
  readonly pvKwh: number;
  readonly pvToLoadKwh: number;
  readonly pvToBatteryKwh: number;
  readonly curtailedKwh: number;
  readonly dieselKwh: number;
  readonly dieselToLoadKwh: number;
  readonly dieselToBatteryKwh: number;
  readonly dieselSpillKwh: number;
  readonly batteryDischargeKwh: number;
  readonly selfDischargeKwh: number;
  readonly floorRestoredKwh: number; // taken from demand to lift the bank back to its floor, part of unmetKwh
  readonly unmetKwh: number;
  readonly fuelLitres: number;
  readonly soc: number;
};
