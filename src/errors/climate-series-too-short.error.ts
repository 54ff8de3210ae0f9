import { Data } from "effect";

export class ClimateSeriesTooShortError extends Data.TaggedError("ClimateSeriesTooShort")<{
  readonly series: "irradiance" | "temperature";
  readonly length: number;
  readonly required: number;
  readonly message: string;
}> {}
