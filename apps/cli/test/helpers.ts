import { FileSystem, Path } from "@effect/platform";
import { CardIndexerLive, TreasureComposerLive } from "@treasure/deck";
import { createMockFileSystemLayer, folderTree } from "@treasure/deck/testing";
import { Effect, Layer } from "effect";
import type { SessionRuntime } from "../src/machines/browserSession";

export type Folders = Record<string, readonly string[]>;

/** In-memory folders of empty files, keyed by absolute path. */
export const foldersLayer = (folders: Folders): Layer.Layer<FileSystem.FileSystem | Path.Path> =>
  Layer.merge(createMockFileSystemLayer(folderTree(folders)), Path.layer);

export const cardNames = (numbers: readonly number[]): string[] =>
  numbers.map((cardNumber) => `treasure${cardNumber}.jpg`);

export const makeRuntime = (folders: Folders): SessionRuntime =>
  Layer.toRuntime(
    Layer.merge(CardIndexerLive.pipe(Layer.provide(foldersLayer(folders))), TreasureComposerLive),
  ).pipe(Effect.scoped, Effect.runSync);
