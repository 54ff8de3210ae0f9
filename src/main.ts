#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger, LogLevel } from "effect"
import { App } from './app.js';
import { ClimateSeries } from './climate/types.js';
import { DispatchEngine } from './dispatch/index.js';
import { serviceLayers } from './layers.js';

const isProd = process.env.NODE_ENV == 'production';

const program = Effect.gen(function*() {
  const app = new App(
    yield* DispatchEngine,
    yield* ClimateSeries,
  );

  yield* app.start().pipe(
    Effect.tapError(err => Effect.logError(`Dispatch sweep failed: ${err.message}`)),
  );
}).pipe(
  Effect.provide(serviceLayers),
  Effect.provide(NodeContext.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
