import { NodeFileSystem, NodePath } from "@effect/platform-node";
import { CardIndexerLive, TreasureComposerLive } from "@treasure/deck";
import { Layer, Logger, type LogLevel } from "effect";

export const NodeServicesLive = Layer.mergeAll(NodeFileSystem.layer, NodePath.layer);

// Full application layer
export const makeAppLive = (logLevel: LogLevel.LogLevel) =>
  Layer.mergeAll(
    NodeServicesLive,
    CardIndexerLive.pipe(Layer.provide(NodeServicesLive)),
    TreasureComposerLive,
    Logger.minimumLogLevel(logLevel),
  );
