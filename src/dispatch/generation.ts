import { STC_CELL_TEMPERATURE_C } from "./constants.js";
import type { DispatchParams } from "./types.js";

// Pure functions for PV output under temperature derating

export const cellTemperature = (
  ambientC: number,
  irradianceKwM2: number,
  noctCoeff: number
): number => ambientC + noctCoeff * irradianceKwM2;

export const temperatureDerating = (cellC: number, deratingCoeff: number): number =>
  Math.max(0, 1 - deratingCoeff * (cellC - STC_CELL_TEMPERATURE_C));

export const pvOutputKw = (
  pvCapacityKw: number,
  irradianceWm2: number,
  ambientC: number,
  params: Pick<DispatchParams, "pvTempDeratingCoeff" | "pvNoctCoeff" | "pvSystemDeratingFactor">
): number => {
  // Night, or a sensor artefact below zero
  if (irradianceWm2 <= 0 || pvCapacityKw <= 0) {
    return 0;
  }

  const irradianceKwM2 = irradianceWm2 / 1000;
  const derating = temperatureDerating(
    cellTemperature(ambientC, irradianceKwM2, params.pvNoctCoeff),
    params.pvTempDeratingCoeff
  );

  return pvCapacityKw * params.pvSystemDeratingFactor * irradianceKwM2 * derating;
};
