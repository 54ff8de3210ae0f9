import { HOURS_PER_DAY, DAYS_PER_YEAR } from "../../dispatch/constants.js";
import type { HourlyClimate } from "../../climate/types.js";

/**
 * Deterministic stand-in for a low-latitude year: a clear-sky bell between
 * 06:00 and 18:00 peaking at 950 W/m², dimmed by a weekly cloud cycle, and
 * a 25-31°C diurnal temperature swing.
 */
export const makeTropicalClimate = (): HourlyClimate => {
  const irradiance: number[] = [];
  const temperature: number[] = [];

  for (let day = 0; day < DAYS_PER_YEAR; day++) {
    const cloudFactor = 0.8 + 0.2 * Math.cos((2 * Math.PI * day) / 7);

    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
      const sun = hour > 6 && hour < 18 ? Math.sin((Math.PI * (hour - 6)) / 12) : 0;
      irradiance.push(950 * sun * cloudFactor);
      temperature.push(28 + 3 * Math.sin((Math.PI * (hour - 9)) / 12));
    }
  }

  return { irradiance, temperature };
};
