import type { Effect } from "effect";
import type { DispatchResult } from "../dispatch/result.js";

export type IEventLogger = {
  onSweepStart: (caseCount: number) => Effect.Effect<void>;
  onCaseSimulated: (name: string, result: DispatchResult) => Effect.Effect<void>;
  onDetailedSummary: (name: string, result: DispatchResult) => Effect.Effect<void>;
};
