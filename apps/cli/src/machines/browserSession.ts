import { parseItemNumber } from "@treasure/core";
import {
  CardIndexer,
  TreasureComposer,
  firstInSection,
  flip,
  initialState,
  jumpToItem,
  lastInSection,
  next,
  prev,
  type ComposeOptions,
  type DeckModel,
  type NavigatorState,
  type StartPosition,
  type TreasureDraw,
} from "@treasure/deck";
import { Effect, Either, Random, Runtime } from "effect";
import { assign, fromPromise, setup, type SnapshotFrom } from "xstate";

export type SessionRuntime = Runtime.Runtime<CardIndexer | TreasureComposer>;

type LoadResult =
  | { readonly _tag: "Loaded"; readonly deck: DeckModel; readonly nav: NavigatorState }
  | { readonly _tag: "Failed"; readonly message: string };

type DrawResult =
  | { readonly _tag: "Drawn"; readonly draw: TreasureDraw }
  | { readonly _tag: "Failed"; readonly message: string };

interface BrowserSessionContext {
  readonly runtime: SessionRuntime;
  // Shared by every draw so a seeded session stays reproducible.
  readonly random: Random.Random | null;
  readonly start: StartPosition;
  readonly composeOptions: ComposeOptions;

  readonly folder: string;
  readonly deck: DeckModel | null;
  readonly nav: NavigatorState;
  readonly draw: TreasureDraw | null;

  readonly error: string | null;
}

export type BrowserSessionEvent =
  | { type: "NEXT" }
  | { type: "PREV" }
  | { type: "FIRST" }
  | { type: "LAST" }
  | { type: "FLIP" }
  | { type: "JUMP"; item: string }
  | { type: "DRAW" }
  | { type: "BROWSE" }
  | { type: "OPEN"; folder: string }
  | { type: "QUIT" };

export interface BrowserSessionInput {
  readonly runtime: SessionRuntime;
  readonly folder: string;
  readonly start?: StartPosition;
  readonly composeOptions?: ComposeOptions;
  readonly random?: Random.Random;
}

const withSessionRandom = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
  random: Random.Random | null,
): Effect.Effect<A, E, R> => (random === null ? effect : Effect.withRandom(effect, random));

const loadActor = fromPromise(
  async ({
    input,
    signal,
  }: {
    input: {
      folder: string;
      start: StartPosition;
      runtime: SessionRuntime;
      random: Random.Random | null;
    };
    signal: AbortSignal;
  }): Promise<LoadResult> => {
    const { folder, start, runtime, random } = input;

    const program = Effect.gen(function* () {
      const indexer = yield* CardIndexer;
      const deck = yield* indexer.reindex(folder);
      const nav = yield* initialState({ start });
      const loaded: LoadResult = { _tag: "Loaded", deck, nav };
      return loaded;
    }).pipe(
      Effect.catchTag("IndexingError", (error) =>
        Effect.succeed<LoadResult>({ _tag: "Failed", message: error.message }),
      ),
    );

    return Runtime.runPromise(runtime)(withSessionRandom(program, random), { signal });
  },
);

const composeActor = fromPromise(
  async ({
    input,
    signal,
  }: {
    input: {
      deck: DeckModel | null;
      composeOptions: ComposeOptions;
      runtime: SessionRuntime;
      random: Random.Random | null;
    };
    signal: AbortSignal;
  }): Promise<DrawResult> => {
    const { deck, composeOptions, runtime, random } = input;

    if (deck === null) {
      return { _tag: "Failed", message: "No card folder is loaded" };
    }

    const program = Effect.gen(function* () {
      const composer = yield* TreasureComposer;
      const draw = yield* composer.compose(deck, composeOptions);
      const drawn: DrawResult = { _tag: "Drawn", draw };
      return drawn;
    }).pipe(
      Effect.catchTag("InsufficientCardsError", (error) =>
        Effect.succeed<DrawResult>({ _tag: "Failed", message: error.message }),
      ),
    );

    return Runtime.runPromise(runtime)(withSessionRandom(program, random), { signal });
  },
);

/** Applies a navigator step that needs the deck; a no-op without one. */
const withDeck =
  (step: (deck: DeckModel, nav: NavigatorState) => NavigatorState) =>
  ({ context }: { context: BrowserSessionContext }) =>
    context.deck === null ? context.nav : step(context.deck, context.nav);

export const browserSessionMachine = setup({
  types: {
    context: {} as BrowserSessionContext,
    events: {} as BrowserSessionEvent,
    input: {} as BrowserSessionInput,
  },

  actors: {
    load: loadActor,
    compose: composeActor,
  },

  guards: {
    hasCards: ({ context }) => context.deck !== null && !context.deck.isEmpty,
    hasDraw: ({ context }) => context.draw !== null,
  },

  actions: {
    clearError: assign({ error: null }),
  },
}).createMachine({
  id: "browserSession",

  context: ({ input }) => ({
    runtime: input.runtime,
    random: input.random ?? null,
    start: input.start ?? "first",
    composeOptions: input.composeOptions ?? {},
    folder: input.folder,
    deck: null,
    nav: { slot: 1, side: "front" },
    draw: null,
    error: null,
  }),

  initial: "loading",

  on: {
    QUIT: { target: "#browserSession.done" },
  },

  states: {
    loading: {
      invoke: {
        src: "load",
        input: ({ context }) => ({
          folder: context.folder,
          start: context.start,
          runtime: context.runtime,
          random: context.random,
        }),
        onDone: {
          target: "loaded",
          actions: assign(({ event }) => {
            const result = event.output;
            if (result._tag === "Failed") {
              return { error: result.message };
            }
            // An empty folder does not replace a deck that is already open.
            if (result.deck.isEmpty) {
              return { error: `No card images found in ${result.deck.rootPath}` };
            }
            return {
              deck: result.deck,
              nav: result.nav,
              folder: result.deck.rootPath,
              draw: null,
              error: null,
            };
          }),
        },
        onError: {
          target: "loaded",
          actions: assign({ error: "Failed to read the card folder" }),
        },
      },
    },

    loaded: {
      always: [{ target: "browsing", guard: "hasCards" }, { target: "needsFolder" }],
    },

    needsFolder: {
      on: {
        OPEN: {
          target: "loading",
          actions: assign({ folder: ({ event }) => event.folder, error: null }),
        },
      },
    },

    browsing: {
      on: {
        NEXT: { actions: assign({ nav: ({ context }) => next(context.nav), error: null }) },
        PREV: { actions: assign({ nav: ({ context }) => prev(context.nav), error: null }) },
        FIRST: {
          actions: assign({ nav: ({ context }) => firstInSection(context.nav), error: null }),
        },
        LAST: {
          actions: assign({ nav: ({ context }) => lastInSection(context.nav), error: null }),
        },
        FLIP: { actions: assign({ nav: withDeck(flip), error: null }) },
        JUMP: {
          actions: assign(({ context, event }) => {
            const deck = context.deck;
            if (deck === null) {
              return {};
            }
            return Either.match(
              Either.flatMap(parseItemNumber(event.item), (item) => jumpToItem(deck, item)),
              {
                onLeft: (error) => ({ error: error.message }),
                onRight: (nav) => ({ nav, error: null }),
              },
            );
          }),
        },
        DRAW: { target: "drawing", guard: "hasCards", actions: "clearError" },
        OPEN: {
          target: "loading",
          actions: assign({ folder: ({ event }) => event.folder, error: null }),
        },
      },
    },

    drawing: {
      invoke: {
        src: "compose",
        input: ({ context }) => ({
          deck: context.deck,
          composeOptions: context.composeOptions,
          runtime: context.runtime,
          random: context.random,
        }),
        onDone: {
          target: "drawn",
          actions: assign(({ event }) =>
            event.output._tag === "Drawn"
              ? { draw: event.output.draw, error: null }
              : { draw: null, error: event.output.message },
          ),
        },
        onError: {
          target: "drawn",
          actions: assign({ draw: null, error: "Failed to draw a treasure" }),
        },
      },
    },

    drawn: {
      always: [{ target: "treasure", guard: "hasDraw" }, { target: "browsing" }],
    },

    treasure: {
      on: {
        DRAW: { target: "drawing" },
        BROWSE: { target: "browsing", actions: "clearError" },
        OPEN: {
          target: "loading",
          actions: assign({ folder: ({ event }) => event.folder, error: null }),
        },
      },
    },

    done: {
      type: "final",
    },
  },
});

export type BrowserSessionSnapshot = SnapshotFrom<typeof browserSessionMachine>;
