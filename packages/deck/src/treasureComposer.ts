import type { Slot, TreasureRole } from "@treasure/core";
import { Context, Effect, Layer, Option, Random, Schema } from "effect";
import type { DeckModel } from "./deckModel";

export const REQUIRED_FRONTS = 1;
export const REQUIRED_BACKS = 4;

export class InsufficientCardsError extends Schema.TaggedError<InsufficientCardsError>(
  "@treasure/deck/InsufficientCardsError",
)("InsufficientCardsError", {
  fronts: Schema.Number,
  backs: Schema.Number,
  requiredFronts: Schema.Number,
  requiredBacks: Schema.Number,
}) {
  override get message(): string {
    return [
      "Not enough images to draw a treasure.",
      `- Filenames end with numbers 21..220`,
      `- Even numbers are backs (need ${this.requiredBacks}+, found ${this.backs})`,
      `- Odd numbers are fronts (need ${this.requiredFronts}+, found ${this.fronts})`,
    ].join("\n");
  }
}

export interface DrawnCard {
  readonly role: TreasureRole;
  readonly slot: Slot;
  readonly filePath: string;
}

export interface TreasureDraw {
  readonly front: DrawnCard;
  /** back1, back2, back3, croppedBack, in that order. */
  readonly backs: readonly [DrawnCard, DrawnCard, DrawnCard, DrawnCard];
}

export interface ComposeOptions {
  /** Let the same back appear more than once in one draw. */
  readonly allowRepeatedBacks?: boolean;
}

export interface TreasureComposer {
  readonly compose: (
    deck: DeckModel,
    options?: ComposeOptions,
  ) => Effect.Effect<TreasureDraw, InsufficientCardsError>;
}

export const TreasureComposer = Context.GenericTag<TreasureComposer>(
  "@treasure/deck/TreasureComposer",
);

const drawn = (deck: DeckModel, role: TreasureRole, slot: Slot): DrawnCard => ({
  role,
  slot,
  filePath: Option.getOrElse(deck.fileAt(slot), () => ""),
});

/**
 * Draws uniformly from `pool`. Without `replace`, the drawn slot leaves the
 * pool (partial Fisher-Yates).
 */
const takeFrom = (pool: Slot[], replace: boolean): Effect.Effect<Slot> =>
  Effect.flatMap(Random.nextIntBetween(0, pool.length), (index) => {
    const slot = replace ? pool[index] : pool.splice(index, 1)[0];
    return slot === undefined
      ? Effect.die(new Error(`Cannot draw from a pool of ${pool.length}`))
      : Effect.succeed(slot);
  });

export const composeTreasure = (
  deck: DeckModel,
  options?: ComposeOptions,
): Effect.Effect<TreasureDraw, InsufficientCardsError> =>
  Effect.gen(function* () {
    const fronts = deck.availableFronts();
    const backs = deck.availableBacks();

    if (fronts.length < REQUIRED_FRONTS || backs.length < REQUIRED_BACKS) {
      return yield* new InsufficientCardsError({
        fronts: fronts.length,
        backs: backs.length,
        requiredFronts: REQUIRED_FRONTS,
        requiredBacks: REQUIRED_BACKS,
      });
    }

    const replace = options?.allowRepeatedBacks === true;
    const backPool = [...backs];
    const takeBack = (role: TreasureRole) =>
      Effect.map(takeFrom(backPool, replace), (slot) => drawn(deck, role, slot));

    const back1 = yield* takeBack("back1");
    const back2 = yield* takeBack("back2");
    const back3 = yield* takeBack("back3");
    const croppedBack = yield* takeBack("croppedBack");
    const front = drawn(deck, "front", yield* takeFrom([...fronts], true));

    yield* Effect.logDebug("Composed treasure", {
      front: front.slot,
      backs: [back1.slot, back2.slot, back3.slot, croppedBack.slot],
    });

    const draw: TreasureDraw = { front, backs: [back1, back2, back3, croppedBack] };
    return draw;
  });

export const TreasureComposerLive: Layer.Layer<TreasureComposer> = Layer.succeed(
  TreasureComposer,
  { compose: composeTreasure },
);

const ROLE_LABELS: Record<TreasureRole, string> = {
  back1: "Back #1",
  back2: "Back #2",
  back3: "Back #3",
  front: "Front",
  croppedBack: "Cropped Back",
};

export const roleLabel = (role: TreasureRole): string => ROLE_LABELS[role];

/** `Back #1: 42 | Back #2: 88 | Back #3: 120 | Front: 57 | Cropped Back: 64` */
export const formatDrawSummary = (draw: TreasureDraw): string => {
  const [back1, back2, back3, croppedBack] = draw.backs;
  return [back1, back2, back3, draw.front, croppedBack]
    .map((card) => `${roleLabel(card.role)}: ${card.slot}`)
    .join(" | ");
};
