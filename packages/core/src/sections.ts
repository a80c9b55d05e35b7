import { Either } from "effect";
import { OutOfRangeError } from "./errors";
import type { CardPair, Section, Side, Slot } from "./types";

export const FIRST_SLOT = 1;
export const LAST_SLOT = 220;

export const SECTIONS: readonly [Section, ...Section[]] = [
  { name: "Instructions", first: 1, last: 12 },
  { name: "Damage", first: 13, last: 14 },
  { name: "DC", first: 15, last: 16 },
  { name: "Misc", first: 17, last: 20 },
  { name: "Items", first: 21, last: 220 },
];

export const isSlot = (value: number): boolean =>
  Number.isInteger(value) && value >= FIRST_SLOT && value <= LAST_SLOT;

export const sectionIndexOf = (slot: Slot): Either.Either<number, OutOfRangeError> => {
  const index = isSlot(slot)
    ? SECTIONS.findIndex((section) => slot >= section.first && slot <= section.last)
    : -1;

  return index === -1
    ? Either.left(new OutOfRangeError({ slot, min: FIRST_SLOT, max: LAST_SLOT }))
    : Either.right(index);
};

export const sectionOf = (slot: Slot): Either.Either<Section, OutOfRangeError> =>
  Either.flatMap(sectionIndexOf(slot), (index) => {
    const section = SECTIONS[index];
    return section === undefined
      ? Either.left(new OutOfRangeError({ slot, min: FIRST_SLOT, max: LAST_SLOT }))
      : Either.right(section);
  });

/** Odd slots hold fronts, even slots hold backs. */
export const sideOfSlot = (slot: Slot): Side => (slot % 2 === 1 ? "front" : "back");

export const otherSide = (side: Side): Side => (side === "front" ? "back" : "front");

export const pairOf = (slot: Slot): CardPair => {
  const front = slot % 2 === 1 ? slot : slot - 1;
  return { front, back: front + 1 };
};

export const slotForSide = (slot: Slot, side: Side): Slot => {
  const pair = pairOf(slot);
  return side === "front" ? pair.front : pair.back;
};
