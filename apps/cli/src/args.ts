import { parseArgs } from "node:util";
import { Either, Option, Schema } from "effect";

export class InvalidArguments extends Schema.TaggedError<InvalidArguments>(
  "@treasure/cli/InvalidArguments",
)("InvalidArguments", {
  message: Schema.String,
}) {}

export interface CliOptions {
  readonly cards: Option.Option<string>;
  readonly draw: boolean;
  readonly seed: Option.Option<number>;
  readonly allowRepeats: boolean;
  readonly randomStart: boolean;
  readonly verbose: boolean;
}

export type CliCommand =
  | { readonly _tag: "Help" }
  | { readonly _tag: "Run"; readonly options: CliOptions };

const SeedFromString = Schema.compose(Schema.NumberFromString, Schema.Number.pipe(Schema.int()));

export const USAGE = [
  "Usage: endless-treasure [options]",
  "",
  "Browse a folder of Deck of Endless Treasure JPG images and draw random treasures.",
  "Filenames end in numbers 1..220; odd numbers are fronts, even numbers are backs.",
  "Items 1..100 are cards 21..220. If --cards is omitted, TREASURE_CARDS_DIR, ./cards",
  "or the current folder is used, and you are asked for another folder when it has no images.",
  "",
  "Options:",
  "  -c, --cards <folder>  folder containing the card images",
  "      --draw            print one random treasure and exit",
  "      --seed <int>      seed the random source for reproducible draws",
  "      --allow-repeats   allow the same back more than once in one draw",
  "      --random-start    start browsing at a random card",
  "      --verbose         log debug details",
  "  -h, --help, -?        show this help message and exit",
].join("\n");

// parseArgs only takes letters as short options.
const normalizeArgv = (argv: readonly string[]): string[] =>
  argv.map((arg) => (arg === "-?" ? "--help" : arg));

export const parseCliArgs = (
  argv: readonly string[],
): Either.Either<CliCommand, InvalidArguments> =>
  Either.try({
    try: () =>
      parseArgs({
        args: normalizeArgv(argv),
        options: {
          cards: { type: "string", short: "c" },
          draw: { type: "boolean" },
          seed: { type: "string" },
          "allow-repeats": { type: "boolean" },
          "random-start": { type: "boolean" },
          verbose: { type: "boolean" },
          help: { type: "boolean", short: "h" },
        },
        allowPositionals: false,
        strict: true,
      }),
    catch: (error) =>
      new InvalidArguments({ message: error instanceof Error ? error.message : String(error) }),
  }).pipe(
    Either.flatMap(({ values }): Either.Either<CliCommand, InvalidArguments> => {
      if (values.help === true) {
        return Either.right<CliCommand>({ _tag: "Help" });
      }

      const seed =
        values.seed === undefined
          ? Either.right(Option.none<number>())
          : Schema.decodeUnknownEither(SeedFromString)(values.seed).pipe(
              Either.map(Option.some),
              Either.mapLeft(
                () =>
                  new InvalidArguments({
                    message: `--seed must be an integer (got "${values.seed}")`,
                  }),
              ),
            );

      return Either.map(seed, (seedValue): CliCommand => ({
        _tag: "Run",
        options: {
          cards: Option.fromNullable(values.cards),
          draw: values.draw === true,
          seed: seedValue,
          allowRepeats: values["allow-repeats"] === true,
          randomStart: values["random-start"] === true,
          verbose: values.verbose === true,
        },
      }));
    }),
  );
