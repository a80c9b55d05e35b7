import { CardIndexer, TreasureComposer } from "@treasure/deck";
import { Effect, Either, Exit, Layer, LogLevel, Option, Random, Runtime, Scope } from "effect";
import { createActor } from "xstate";
import { USAGE, parseCliArgs, type CliOptions } from "./args";
import { resolveCardsFolder } from "./config";
import { browserSessionMachine } from "./machines/browserSession";
import { formatTreasure } from "./render";
import { makeAppLive } from "./services";
import { runTerminal } from "./terminal";

const reportFailure = (message: string): number => {
  console.error(message);
  return 1;
};

const printDraw = (folder: string, options: CliOptions, random: Random.Random | undefined) =>
  Effect.gen(function* () {
    const indexer = yield* CardIndexer;
    const composer = yield* TreasureComposer;
    const deck = yield* indexer.reindex(folder);
    const draw = yield* composer.compose(deck, { allowRepeatedBacks: options.allowRepeats });
    console.log(formatTreasure(draw));
    return 0;
  }).pipe(
    (program) => (random === undefined ? program : Effect.withRandom(program, random)),
    Effect.catchTags({
      IndexingError: (error) => Effect.sync(() => reportFailure(error.message)),
      InsufficientCardsError: (error) => Effect.sync(() => reportFailure(error.message)),
    }),
  );

const run = async (options: CliOptions): Promise<number> => {
  const logLevel = options.verbose ? LogLevel.Debug : LogLevel.Warning;

  const { runtime, close } = await Effect.runPromise(
    Effect.gen(function* () {
      const scope = yield* Scope.make();
      const runtime = yield* Layer.toRuntime(makeAppLive(logLevel)).pipe(Scope.extend(scope));
      return { runtime, close: Scope.close(scope, Exit.void) };
    }),
  );

  try {
    const folder = await Runtime.runPromise(runtime)(
      resolveCardsFolder({ fromArgs: options.cards, cwd: process.cwd() }),
    );
    const random = Option.getOrUndefined(Option.map(options.seed, (seed) => Random.make(seed)));

    if (options.draw) {
      return await Runtime.runPromise(runtime)(printDraw(folder, options, random));
    }

    const actor = createActor(browserSessionMachine, {
      input: {
        runtime,
        folder,
        start: options.randomStart ? "random" : "first",
        composeOptions: { allowRepeatedBacks: options.allowRepeats },
        random,
      },
    });
    actor.start();
    await runTerminal(actor);
    return 0;
  } finally {
    await Effect.runPromise(close);
  }
};

const main = async (argv: readonly string[]): Promise<number> => {
  const command = parseCliArgs(argv);

  if (Either.isLeft(command)) {
    console.error(command.left.message);
    console.error(USAGE);
    return 1;
  }

  if (command.right._tag === "Help") {
    console.log(USAGE);
    return 0;
  }

  return run(command.right.options);
};

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[endless-treasure] unexpected failure", error);
    process.exitCode = 1;
  },
);
