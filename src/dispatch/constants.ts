export const HOURS_PER_DAY = 24;
export const DAYS_PER_YEAR = 365;
export const HOURS_PER_YEAR = HOURS_PER_DAY * DAYS_PER_YEAR; // 8760

// Cell temperature at which panels deliver nameplate output
export const STC_CELL_TEMPERATURE_C = 25;

export const UNMET_TOLERANCE_KWH = 1e-6;
