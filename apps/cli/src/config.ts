import { FileSystem, Path } from "@effect/platform";
import { Config, Effect, Option } from "effect";

export const CARDS_DIR_ENV = "TREASURE_CARDS_DIR";
export const DEFAULT_CARDS_SUBDIR = "cards";

export interface CardsFolderSources {
  readonly fromArgs: Option.Option<string>;
  readonly cwd: string;
}

/**
 * Picks the folder to open: `--cards`, then `TREASURE_CARDS_DIR`, then
 * `./cards` when it exists, then the working directory.
 */
export const resolveCardsFolder = (
  sources: CardsFolderSources,
): Effect.Effect<string, never, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    if (Option.isSome(sources.fromArgs)) {
      return pathService.resolve(sources.cwd, sources.fromArgs.value);
    }

    const fromEnv = yield* Config.option(Config.nonEmptyString(CARDS_DIR_ENV)).pipe(
      Effect.orElseSucceed(() => Option.none<string>()),
    );

    if (Option.isSome(fromEnv)) {
      return pathService.resolve(sources.cwd, fromEnv.value);
    }

    const local = pathService.join(sources.cwd, DEFAULT_CARDS_SUBDIR);
    const hasLocal = yield* fileSystem.exists(local).pipe(Effect.orElseSucceed(() => false));

    if (hasLocal) {
      yield* Effect.logDebug("Using the cards folder next to the working directory", { local });
      return local;
    }

    return pathService.resolve(sources.cwd);
  });
