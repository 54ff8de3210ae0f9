import { Data } from "effect";
import type { ParseError } from "effect/ParseResult";

export class InvalidDispatchParamsError extends Data.TaggedError("InvalidDispatchParams")<{
  readonly message: string;
  readonly cause: ParseError;
}> {}
