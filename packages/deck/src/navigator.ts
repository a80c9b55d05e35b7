import {
  FIRST_SLOT,
  LAST_SLOT,
  SECTIONS,
  otherSide,
  sectionIndexOf,
  sideOfSlot,
  slotForSide,
  type InvalidItemError,
  type ItemNumber,
  type Section,
  type Side,
  type Slot,
} from "@treasure/core";
import { Effect, Either, Option, Random } from "effect";
import type { DeckModel } from "./deckModel";

/**
 * Cursor over the deck. A plain value: every transition returns a new state.
 * `side` always matches the parity of `slot`.
 */
export interface NavigatorState {
  readonly slot: Slot;
  readonly side: Side;
}

export interface NavigatorView {
  readonly slot: Slot;
  readonly side: Side;
  readonly section: Section;
  readonly itemNumber: Option.Option<ItemNumber>;
  readonly filePath: Option.Option<string>;
}

export type StartPosition = "first" | "random";

export interface InitialStateOptions {
  readonly start?: StartPosition;
}

export const atSlot = (slot: Slot): NavigatorState => ({ slot, side: sideOfSlot(slot) });

const sectionAt = (slot: Slot): { readonly index: number; readonly section: Section } => {
  const index = Either.getOrElse(sectionIndexOf(slot), () => 0);
  return { index, section: SECTIONS[index] ?? SECTIONS[0] };
};

const sectionByIndex = (index: number): Section =>
  SECTIONS[(index + SECTIONS.length) % SECTIONS.length] ?? SECTIONS[0];

export const initialState = (
  options?: InitialStateOptions,
): Effect.Effect<NavigatorState> =>
  options?.start === "random"
    ? Effect.map(Random.nextIntBetween(FIRST_SLOT, LAST_SLOT + 1), atSlot)
    : Effect.succeed(atSlot(FIRST_SLOT));

/** One slot forward; past the end of a section into the next, past 220 back to 1. */
export const next = (state: NavigatorState): NavigatorState => {
  const { index, section } = sectionAt(state.slot);
  if (state.slot < section.last) {
    return atSlot(state.slot + 1);
  }
  return atSlot(sectionByIndex(index + 1).first);
};

export const prev = (state: NavigatorState): NavigatorState => {
  const { index, section } = sectionAt(state.slot);
  if (state.slot > section.first) {
    return atSlot(state.slot - 1);
  }
  return atSlot(sectionByIndex(index - 1).last);
};

export const firstInSection = (state: NavigatorState): NavigatorState =>
  atSlot(sectionAt(state.slot).section.first);

export const lastInSection = (state: NavigatorState): NavigatorState =>
  atSlot(sectionAt(state.slot).section.last);

/** Turns the card over when the other side has an image; otherwise returns `state` itself. */
export const flip = (deck: DeckModel, state: NavigatorState): NavigatorState => {
  const target = slotForSide(state.slot, otherSide(state.side));
  return Option.isSome(deck.fileAt(target)) ? atSlot(target) : state;
};

/**
 * Moves to an item's front, or to its back when only the back is present.
 * On failure the caller keeps its current state.
 */
export const jumpToItem = (
  deck: DeckModel,
  item: ItemNumber,
): Either.Either<NavigatorState, InvalidItemError> =>
  Either.map(deck.itemToSlot(item), (front) =>
    Option.isNone(deck.fileAt(front)) && Option.isSome(deck.fileAt(front + 1))
      ? atSlot(front + 1)
      : atSlot(front),
  );

export const viewOf = (deck: DeckModel, state: NavigatorState): NavigatorView => ({
  slot: state.slot,
  side: state.side,
  section: sectionAt(state.slot).section,
  itemNumber: deck.itemNumberOf(state.slot),
  filePath: deck.fileAt(state.slot),
});
