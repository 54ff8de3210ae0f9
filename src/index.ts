export * from "./dispatch/index.js";
export { ClimateSeries, ClimateDataNotAvailableError, type HourlyClimate, type IClimateSeries } from "./climate/types.js";
export {
  CsvClimateSeriesLayer,
  DEFAULT_CSV_LAYOUT,
  parseClimateColumn,
  type CsvClimateSeriesConfig,
  type CsvColumnLayout,
} from "./climate/csv-climate-series.adapter.js";
export { HOURS_PER_YEAR } from "./dispatch/constants.js";
export { ClimateConfig, DispatchParamsConfig, dispatchDefaults } from "./config.js";
export { ClimateSeriesTooShortError } from "./errors/climate-series-too-short.error.js";
export { InvalidDispatchParamsError } from "./errors/invalid-dispatch-params.error.js";
export { InvalidLoadShapeError } from "./errors/invalid-load-shape.error.js";
export { InvalidSimulationInputError } from "./errors/invalid-simulation-input.error.js";
