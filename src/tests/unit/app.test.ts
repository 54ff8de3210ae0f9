import { describe, it, vitest, beforeEach, expect } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Effect } from "effect";
import type { IDispatchEngine } from "../../dispatch/index.js";
import type { IClimateSeries } from "../../climate/types.js";
import { ClimateDataNotAvailableError } from "../../climate/types.js";
import type { IEventLogger } from "../../event-logger/types.js";
import { DispatchResult } from "../../dispatch/result.js";
import { InvalidSimulationInputError } from "../../errors/invalid-simulation-input.error.js";
import { App, DETAILED_CASE, REFERENCE_ISLANDS, type ReferenceIsland } from "../../app.js";
import { dispatchDefaults } from "../../config.js";

const emptyResult = new DispatchResult({
    pvCapacityKw: 0,
    batteryCapacityKwh: 0,
    dieselCapacityKw: 0,
    annualDemandKwh: 0,
    pvGenerationKwh: 0,
    dieselGenerationKwh: 0,
    batteryDischargeKwh: 0,
    curtailmentKwh: 0,
    unmetDemandKwh: 0,
    dieselSpillKwh: 0,
    fuelLitres: 0,
    dieselHours: 0,
    unmetHours: 0,
    curtailmentHours: 0,
    avgSoc: 0,
    maxDod: 0,
    batteryCycles: 0,
    batteryWearCycles: 0,
});

describe('App', () => {
    const dispatchEngineMock: MockedObject<IDispatchEngine> = {
        params: dispatchDefaults,
        run: vitest.fn(),
    };

    const climateSeriesMock: MockedObject<IClimateSeries> = {
        getHourlySeries: vitest.fn(),
    };

    const eventLoggerMock: MockedObject<IEventLogger> = {
        onSweepStart: vitest.fn(),
        onCaseSimulated: vitest.fn(),
        onDetailedSummary: vitest.fn(),
    };

    const climate = {
        irradiance: Array.from({ length: 8_760 }, () => 500),
        temperature: Array.from({ length: 8_760 }, () => 28),
    };

    let app: App;

    beforeEach(() => {
        vitest.clearAllMocks();
        // DispatchEngine echoes the requested capacities
        dispatchEngineMock.run.mockImplementation((request) =>
            Effect.succeed(
                new DispatchResult({
                    ...emptyResult,
                    pvCapacityKw: request.pvCapacityKw,
                    batteryCapacityKwh: request.batteryCapacityKwh,
                    dieselCapacityKw: request.dieselCapacityKw,
                    annualDemandKwh: request.annualDemandKwh,
                })
            )
        );
        climateSeriesMock.getHourlySeries.mockReturnValue(Effect.succeed(climate));
        eventLoggerMock.onSweepStart.mockReturnValue(Effect.void);
        eventLoggerMock.onCaseSimulated.mockReturnValue(Effect.void);
        eventLoggerMock.onDetailedSummary.mockReturnValue(Effect.void);

        app = new App(dispatchEngineMock, climateSeriesMock, eventLoggerMock);
    });

    it.effect('should simulate every reference island against the same climate', () =>
        Effect.gen(function* () {
            const results = yield* app.start();

            expect(results.map((entry) => entry.name)).toEqual(REFERENCE_ISLANDS.map((island) => island.name));
            expect(dispatchEngineMock.run).toHaveBeenCalledTimes(REFERENCE_ISLANDS.length);
            expect(dispatchEngineMock.run).toHaveBeenNthCalledWith(1, {
                pvCapacityKw: 50,
                batteryCapacityKwh: 100,
                dieselCapacityKw: 30,
                annualDemandKwh: 200_000,
                irradiance: climate.irradiance,
                temperature: climate.temperature,
            });
            expect(climateSeriesMock.getHourlySeries).toHaveBeenCalledTimes(1);
        })
    );

    it.effect('should pair each result with its island', () =>
        Effect.gen(function* () {
            const results = yield* app.start();

            for (const [index, island] of REFERENCE_ISLANDS.entries()) {
                expect(results[index]?.result.pvCapacityKw).toBe(island.pvCapacityKw);
                expect(results[index]?.result.annualDemandKwh).toBe(island.annualDemandKwh);
            }
        })
    );

    it.effect('should report the sweep, each case and the detailed case', () =>
        Effect.gen(function* () {
            const results = yield* app.start();
            const detailed = results.find((entry) => entry.name === DETAILED_CASE);

            expect(eventLoggerMock.onSweepStart).toHaveBeenCalledWith(6);
            expect(eventLoggerMock.onCaseSimulated).toHaveBeenCalledTimes(6);
            expect(eventLoggerMock.onCaseSimulated).toHaveBeenCalledWith("Diesel-only (no solar)", results[4]?.result);
            expect(eventLoggerMock.onDetailedSummary).toHaveBeenCalledOnce();
            expect(eventLoggerMock.onDetailedSummary).toHaveBeenCalledWith(DETAILED_CASE, detailed?.result);
        })
    );

    it.effect('should skip the detailed summary when the detailed case is not swept', () =>
        Effect.gen(function* () {
            const islands: ReferenceIsland[] = [
                { name: "Test atoll", pvCapacityKw: 10, batteryCapacityKwh: 20, dieselCapacityKw: 5, annualDemandKwh: 30_000 },
            ];
            const results = yield* new App(dispatchEngineMock, climateSeriesMock, eventLoggerMock, islands).start();

            expect(results).toHaveLength(1);
            expect(eventLoggerMock.onSweepStart).toHaveBeenCalledWith(1);
            expect(eventLoggerMock.onDetailedSummary).not.toHaveBeenCalled();
        })
    );

    it.effect('should stop before simulating when climate data is missing', () =>
        Effect.gen(function* () {
            climateSeriesMock.getHourlySeries.mockReturnValue(
                Effect.fail(new ClimateDataNotAvailableError({ message: "Unable to read irradiance data" }))
            );

            const error = yield* Effect.flip(app.start());

            expect(error._tag).toBe("ClimateDataNotAvailable");
            expect(dispatchEngineMock.run).not.toHaveBeenCalled();
            expect(eventLoggerMock.onSweepStart).not.toHaveBeenCalled();
        })
    );

    it.effect('should stop the sweep at the first failing case', () =>
        Effect.gen(function* () {
            dispatchEngineMock.run.mockReturnValueOnce(
                Effect.fail(
                    new InvalidSimulationInputError({ field: "pvCapacityKw", message: "pvCapacityKw must be a finite non-negative number, got -1" })
                )
            );

            const error = yield* Effect.flip(app.start());

            expect(error).toMatchObject({ _tag: "InvalidSimulationInput", field: "pvCapacityKw" });
            expect(dispatchEngineMock.run).toHaveBeenCalledOnce();
            expect(eventLoggerMock.onCaseSimulated).not.toHaveBeenCalled();
        })
    );
});
