import { Effect, Layer } from "effect";
import { FileSystem } from "@effect/platform";
import { HOURS_PER_YEAR } from "../dispatch/constants.js";
import { ClimateSeriesTooShortError } from "../errors/climate-series-too-short.error.js";
import { ClimateDataNotAvailableError, ClimateSeries } from "./types.js";

export type CsvColumnLayout = {
  readonly separator: string;
  readonly headerLines: number;
  readonly column: number; // zero-based
};

// Hourly export format of the irradiance/temperature time-series files
export const DEFAULT_CSV_LAYOUT: CsvColumnLayout = {
  separator: ";",
  headerLines: 22,
  column: 4,
};

export type CsvClimateSeriesConfig = {
  readonly irradiancePath: string;
  readonly temperaturePath: string;
  readonly layout?: CsvColumnLayout;
};

export const parseClimateColumn = (
  content: string,
  layout: CsvColumnLayout,
  source = "<inline>"
): Effect.Effect<number[], ClimateDataNotAvailableError> =>
  Effect.gen(function* () {
    const lines = content.split(/\r?\n/);
    const values: number[] = [];

    for (let index = layout.headerLines; index < lines.length; index++) {
      const line = lines[index]?.trim() ?? "";
      if (line === "") {
        continue;
      }

      const cell = line.split(layout.separator)[layout.column]?.trim();
      const value = cell === undefined || cell === "" ? Number.NaN : Number(cell);

      if (!Number.isFinite(value)) {
        return yield* Effect.fail(
          new ClimateDataNotAvailableError({
            message: `${source}:${index + 1}: column ${layout.column} is not a number (${cell ?? "missing"})`,
          })
        );
      }

      values.push(value);
    }

    return values;
  });

export const CsvClimateSeriesLayer = (
  config: CsvClimateSeriesConfig
): Layer.Layer<ClimateSeries, never, FileSystem.FileSystem> =>
  Layer.effect(
    ClimateSeries,
    Effect.gen(function* () {
      const fileSystem = yield* FileSystem.FileSystem;
      const layout = config.layout ?? DEFAULT_CSV_LAYOUT;

      const loadSeries = (series: "irradiance" | "temperature", path: string) =>
        Effect.gen(function* () {
          const content = yield* fileSystem.readFileString(path).pipe(
            Effect.mapError(
              (error) =>
                new ClimateDataNotAvailableError({
                  message: `Unable to read ${series} data from ${path}: ${error.message}`,
                  cause: error,
                })
            )
          );

          const values = yield* parseClimateColumn(content, layout, path);

          if (values.length < HOURS_PER_YEAR) {
            return yield* Effect.fail(
              new ClimateSeriesTooShortError({
                series,
                length: values.length,
                required: HOURS_PER_YEAR,
                message: `${path} has ${values.length} usable rows, expected at least ${HOURS_PER_YEAR}`,
              })
            );
          }

          yield* Effect.logDebug(`Loaded ${series} series`, { path, rows: values.length });
          return values.slice(0, HOURS_PER_YEAR);
        });

      const getHourlySeries = () =>
        Effect.all({
          irradiance: loadSeries("irradiance", config.irradiancePath),
          temperature: loadSeries("temperature", config.temperaturePath),
        }).pipe(Effect.withSpan("climate.getHourlySeries"));

      return ClimateSeries.of({
        getHourlySeries,
      });
    })
  );
