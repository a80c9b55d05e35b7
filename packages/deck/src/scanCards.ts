import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import {
  DEFAULT_IMAGE_EXTENSIONS,
  FIRST_SLOT,
  LAST_SLOT,
  hasImageExtension,
  parseTrailingNumber,
  stemOf,
} from "@treasure/core";
import { Array as Arr, Effect, Option, Order, Schema } from "effect";

export interface ScanCardsOptions {
  readonly includeHidden?: boolean;
  readonly extensions?: readonly string[];
}

export const CardFileSchema = Schema.Struct({
  cardNumber: Schema.Number,
  filePath: Schema.String,
  fileName: Schema.String,
  origin: Schema.Literal("numbered", "alias"),
});

export type CardFile = typeof CardFileSchema.Type;

export const CardIndexSchema = Schema.Struct({
  rootPath: Schema.String,
  files: Schema.Array(CardFileSchema),
  /** Image files with no usable number. */
  ignored: Schema.Array(Schema.String),
});

export type CardIndex = typeof CardIndexSchema.Type;

export const IndexingFailureReason = Schema.Literal("NotFound", "NotDirectory", "Unreadable");

export type IndexingFailureReason = typeof IndexingFailureReason.Type;

export class IndexingError extends Schema.TaggedError<IndexingError>(
  "@treasure/deck/IndexingError",
)("IndexingError", {
  rootPath: Schema.String,
  reason: IndexingFailureReason,
  message: Schema.String,
}) {}

const mapRootError = (rootPath: string, error: PlatformError): IndexingError => {
  if (error._tag === "SystemError" && error.reason === "NotFound") {
    return new IndexingError({
      rootPath,
      reason: "NotFound",
      message: `Folder not found: ${rootPath}`,
    });
  }

  return new IndexingError({
    rootPath,
    reason: "Unreadable",
    message: `Cannot read ${rootPath}: ${error.message}`,
  });
};

// Only the root folder is fatal; a single bad entry is skipped.
const statBestEffort = (
  absolutePath: string,
  fileSystem: FileSystem.FileSystem,
): Effect.Effect<Option.Option<FileSystem.File.Info>> =>
  fileSystem.stat(absolutePath).pipe(
    Effect.map(Option.some),
    Effect.catchAll((error) =>
      Effect.logWarning("Skipping unreadable card file", {
        path: absolutePath,
        error: error.message,
      }).pipe(Effect.as(Option.none())),
    ),
  );

const byCardNumber = Order.combine(
  Order.mapInput(Order.number, (file: CardFile) => file.cardNumber),
  Order.mapInput(Order.string, (file: CardFile) => file.fileName),
);

/**
 * The unnumbered first card: `Cards.jpg` next to `Cards2.jpg` is card 1.
 * Only applies when nothing is explicitly numbered 1.
 */
const findAliases = (
  unnumbered: readonly string[],
  numbered: readonly CardFile[],
): readonly string[] => {
  if (numbered.some((file) => file.cardNumber === 1)) {
    return [];
  }

  const secondStems = new Set(
    numbered.filter((file) => file.cardNumber === 2).map((file) => stemOf(file.fileName)),
  );

  return unnumbered.filter((fileName) => secondStems.has(`${stemOf(fileName)}2`));
};

const normalizeOptions = (options?: ScanCardsOptions) => ({
  includeHidden: options?.includeHidden === true,
  extensions: options?.extensions ?? DEFAULT_IMAGE_EXTENSIONS,
});

export const scanCards = (
  rootPath: string,
  options?: ScanCardsOptions,
): Effect.Effect<CardIndex, IndexingError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const normalizedRootPath = pathService.resolve(rootPath);

    const rootStat = yield* fileSystem
      .stat(normalizedRootPath)
      .pipe(Effect.mapError((error) => mapRootError(normalizedRootPath, error)));

    if (rootStat.type !== "Directory") {
      return yield* new IndexingError({
        rootPath: normalizedRootPath,
        reason: "NotDirectory",
        message: `Not a folder: ${normalizedRootPath}`,
      });
    }

    const entries = yield* fileSystem
      .readDirectory(normalizedRootPath)
      .pipe(Effect.mapError((error) => mapRootError(normalizedRootPath, error)));

    const resolved = normalizeOptions(options);
    const numbered: CardFile[] = [];
    const unnumbered: string[] = [];
    const ignored: string[] = [];

    for (const fileName of [...entries].sort()) {
      if (!resolved.includeHidden && fileName.startsWith(".")) {
        continue;
      }

      if (!hasImageExtension(fileName, resolved.extensions)) {
        continue;
      }

      const filePath = pathService.join(normalizedRootPath, fileName);
      const info = yield* statBestEffort(filePath, fileSystem);

      if (Option.isNone(info) || info.value.type !== "File") {
        continue;
      }

      const cardNumber = parseTrailingNumber(fileName);

      if (Option.isNone(cardNumber)) {
        unnumbered.push(fileName);
        continue;
      }

      if (cardNumber.value < FIRST_SLOT || cardNumber.value > LAST_SLOT) {
        ignored.push(fileName);
        continue;
      }

      numbered.push({ cardNumber: cardNumber.value, filePath, fileName, origin: "numbered" });
    }

    const aliases = findAliases(unnumbered, numbered);
    const aliased: CardFile[] = aliases.map((fileName) => ({
      cardNumber: 1,
      filePath: pathService.join(normalizedRootPath, fileName),
      fileName,
      origin: "alias",
    }));

    ignored.push(...unnumbered.filter((fileName) => !aliases.includes(fileName)));

    const files = Arr.sort(byCardNumber)([...numbered, ...aliased]);

    const claimed = new Map<number, number>();
    for (const file of files) {
      claimed.set(file.cardNumber, (claimed.get(file.cardNumber) ?? 0) + 1);
    }

    for (const [cardNumber, count] of claimed) {
      if (count > 1) {
        yield* Effect.logWarning("Several files claim the same card number", {
          cardNumber,
          files: files
            .filter((file) => file.cardNumber === cardNumber)
            .map((file) => file.fileName),
        });
      }
    }

    yield* Effect.logDebug("Indexed card folder", {
      rootPath: normalizedRootPath,
      files: files.length,
      ignored: ignored.length,
    });

    return {
      rootPath: normalizedRootPath,
      files,
      ignored: [...ignored].sort(),
    };
  });
