import { Config as EffectConfig } from "effect";
import type { DispatchParams } from "./dispatch/types.js";

// Reference values of the rule-based dispatch methodology
export const dispatchDefaults: DispatchParams = {
  pvTempDeratingCoeff: 0.005,
  pvNoctCoeff: 25.6,
  pvSystemDeratingFactor: 0.9,
  batteryDodMax: 0.8, // LFP
  batteryChargeEfficiency: 0.938, // √0.88 round trip
  batteryDischargeEfficiency: 0.938,
  batterySelfDischargeRate: 0.0002,
  batteryCycleLifeCoeffA: 531.52764,
  batteryCycleLifeCoeffB: -1.12297,
  batteryInitialSoc: 0.5, // washes out after the first few days
  dieselMinLoadFraction: 0.4,
  fuelCurveIdleCoeff: 0.08145,
  fuelCurveProportionalCoeff: 0.246,
  breakHour: 17,
  availableEnergyBasis: "state-of-charge",
};

const numberWithDefault = (name: string, fallback: number) =>
  EffectConfig.number(name).pipe(EffectConfig.withDefault(fallback));

export const DispatchParamsConfig: EffectConfig.Config<DispatchParams> = EffectConfig.all({
  pvTempDeratingCoeff: numberWithDefault("DISPATCH_PV_TEMP_DERATING_COEFF", dispatchDefaults.pvTempDeratingCoeff),
  pvNoctCoeff: numberWithDefault("DISPATCH_PV_NOCT_COEFF", dispatchDefaults.pvNoctCoeff),
  pvSystemDeratingFactor: numberWithDefault("DISPATCH_PV_SYSTEM_DERATING_FACTOR", dispatchDefaults.pvSystemDeratingFactor),
  batteryDodMax: numberWithDefault("DISPATCH_BATTERY_DOD_MAX", dispatchDefaults.batteryDodMax),
  batteryChargeEfficiency: numberWithDefault("DISPATCH_BATTERY_CHARGE_EFFICIENCY", dispatchDefaults.batteryChargeEfficiency),
  batteryDischargeEfficiency: numberWithDefault(
    "DISPATCH_BATTERY_DISCHARGE_EFFICIENCY",
    dispatchDefaults.batteryDischargeEfficiency
  ),
  batterySelfDischargeRate: numberWithDefault(
    "DISPATCH_BATTERY_SELF_DISCHARGE_RATE",
    dispatchDefaults.batterySelfDischargeRate
  ),
  batteryCycleLifeCoeffA: numberWithDefault("DISPATCH_BATTERY_CYCLE_LIFE_COEFF_A", dispatchDefaults.batteryCycleLifeCoeffA),
  batteryCycleLifeCoeffB: numberWithDefault("DISPATCH_BATTERY_CYCLE_LIFE_COEFF_B", dispatchDefaults.batteryCycleLifeCoeffB),
  batteryInitialSoc: numberWithDefault("DISPATCH_BATTERY_INITIAL_SOC", dispatchDefaults.batteryInitialSoc),
  dieselMinLoadFraction: numberWithDefault("DISPATCH_DIESEL_MIN_LOAD_FRACTION", dispatchDefaults.dieselMinLoadFraction),
  fuelCurveIdleCoeff: numberWithDefault("DISPATCH_FUEL_CURVE_IDLE_COEFF", dispatchDefaults.fuelCurveIdleCoeff),
  fuelCurveProportionalCoeff: numberWithDefault(
    "DISPATCH_FUEL_CURVE_PROPORTIONAL_COEFF",
    dispatchDefaults.fuelCurveProportionalCoeff
  ),
  breakHour: EffectConfig.integer("DISPATCH_BREAK_HOUR").pipe(EffectConfig.withDefault(dispatchDefaults.breakHour)),
  availableEnergyBasis: EffectConfig.literal("state-of-charge", "above-floor")("DISPATCH_AVAILABLE_ENERGY_BASIS").pipe(
    EffectConfig.withDefault(dispatchDefaults.availableEnergyBasis)
  ),
});

export const ClimateConfig = {
  irradiancePath: EffectConfig.string("CLIMATE_GHI_PATH").pipe(
    EffectConfig.withDefault("data/supplementary/GHI_hourly.csv")
  ),
  temperaturePath: EffectConfig.string("CLIMATE_TEMPERATURE_PATH").pipe(
    EffectConfig.withDefault("data/supplementary/Temperature_hourly.csv")
  ),
};
