import { Effect, Layer } from "effect";
import { ClimateConfig } from "./config.js";
import { CsvClimateSeriesLayer } from "./climate/csv-climate-series.adapter.js";
import { DispatchEngineLayer } from "./dispatch/index.js";

export const ClimateSeriesFromConfigLayer = Layer.unwrapEffect(
    Effect.gen(function* () {
        const irradiancePath = yield* ClimateConfig.irradiancePath;
        const temperaturePath = yield* ClimateConfig.temperaturePath;
        return CsvClimateSeriesLayer({ irradiancePath, temperaturePath });
    })
);

export const serviceLayers = Layer.mergeAll(
    DispatchEngineLayer,
    ClimateSeriesFromConfigLayer,
);
