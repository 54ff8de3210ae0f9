import { Data } from "effect";

export class InvalidSimulationInputError extends Data.TaggedError("InvalidSimulationInput")<{
  readonly field: string;
  readonly message: string;
}> {}
