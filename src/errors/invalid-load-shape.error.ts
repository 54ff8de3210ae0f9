import { Data } from "effect";

export class InvalidLoadShapeError extends Data.TaggedError("InvalidLoadShape")<{
  readonly message: string;
}> {}
