import { FileSystem, Path } from "@effect/platform";
import { Context, Effect, Layer } from "effect";
import { makeDeckModel, type DeckModel } from "./deckModel";
import { scanCards, type IndexingError, type ScanCardsOptions } from "./scanCards";

export interface CardIndexer {
  /** Scans `rootPath` from scratch and builds a fresh deck. */
  readonly reindex: (
    rootPath: string,
    options?: ScanCardsOptions,
  ) => Effect.Effect<DeckModel, IndexingError>;
}

export const CardIndexer = Context.GenericTag<CardIndexer>("@treasure/deck/CardIndexer");

export const CardIndexerLive: Layer.Layer<CardIndexer, never, FileSystem.FileSystem | Path.Path> =
  Layer.effect(
    CardIndexer,
    Effect.gen(function* () {
      const fileSystem = yield* FileSystem.FileSystem;
      const pathService = yield* Path.Path;

      return {
        reindex: (rootPath, options) =>
          scanCards(rootPath, options).pipe(
            Effect.map(makeDeckModel),
            Effect.tap((deck) =>
              Effect.logInfo("Loaded card folder", { rootPath: deck.rootPath, cards: deck.size }),
            ),
            Effect.provideService(FileSystem.FileSystem, fileSystem),
            Effect.provideService(Path.Path, pathService),
          ),
      };
    }),
  );
