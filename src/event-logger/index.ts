import type { IEventLogger } from "./types.js";
import type { DispatchResult } from "../dispatch/result.js";
import { Effect } from "effect";

const NAME_WIDTH = 26;

export const TABLE_HEADER = [
  "Case".padEnd(NAME_WIDTH),
  "PV CF".padStart(7),
  "Curt%".padStart(6),
  "Diesel%".padStart(8),
  "LPSP".padStart(6),
  "Fuel kL".padStart(8),
  "DslHrs".padStart(7),
  "BatCyc".padStart(7),
].join(" ");

export const formatCaseRow = (name: string, result: DispatchResult): string =>
  [
    name.padEnd(NAME_WIDTH),
    result.effectivePvCapacityFactor.toFixed(3).padStart(7),
    `${(result.curtailmentFraction * 100).toFixed(1)}%`.padStart(6),
    `${(result.dieselShare * 100).toFixed(1)}%`.padStart(8),
    result.lpsp.toFixed(4).padStart(6),
    (result.fuelLitres / 1000).toFixed(1).padStart(8),
    String(result.dieselHours).padStart(7),
    result.batteryCycles.toFixed(1).padStart(7),
  ].join(" ");

export class EventLogger implements IEventLogger {

  public onSweepStart(caseCount: number) {
    return Effect.log(`Running ${caseCount} reference dispatch cases`).pipe(
      Effect.zipRight(Effect.log(TABLE_HEADER))
    );
  }

  public onCaseSimulated(name: string, result: DispatchResult) {
    return Effect.log(formatCaseRow(name, result));
  }

  public onDetailedSummary(name: string, result: DispatchResult) {
    return Effect.forEach(
      Object.entries(result.summary()),
      ([key, value]) => Effect.log(`${name} | ${key.padEnd(20)}: ${value}`),
      { discard: true }
    );
  }
}
