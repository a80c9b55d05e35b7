import {
  ITEMS_FIRST_SLOT,
  LAST_SLOT,
  isSlot,
  itemNumberOf,
  itemToSlot,
  sectionOf,
  slotForSide,
  type InvalidItemError,
  type ItemNumber,
  type OutOfRangeError,
  type Section,
  type Side,
  type Slot,
} from "@treasure/core";
import { type Either, Option } from "effect";
import type { CardFile, CardIndex } from "./scanCards";

/**
 * Read-only view of an indexed card folder. Built once per reindex and shared
 * by the navigator and the treasure composer.
 */
export interface DeckModel {
  readonly rootPath: string;
  /** The file chosen for each occupied slot, by slot. */
  readonly files: readonly CardFile[];
  readonly size: number;
  readonly isEmpty: boolean;
  readonly fileAt: (slot: Slot) => Option.Option<string>;
  /** The given side of the card that contains `slot`. */
  readonly cardAt: (slot: Slot, side: Side) => Option.Option<string>;
  readonly sectionOf: (slot: Slot) => Either.Either<Section, OutOfRangeError>;
  readonly itemNumberOf: (slot: Slot) => Option.Option<ItemNumber>;
  readonly itemToSlot: (item: ItemNumber) => Either.Either<Slot, InvalidItemError>;
  readonly availableFronts: () => readonly Slot[];
  readonly availableBacks: () => readonly Slot[];
}

// Explicitly numbered files win over the unnumbered alias; ties go to the
// first file name.
const precedence = (a: CardFile, b: CardFile): number => {
  if (a.origin !== b.origin) {
    return a.origin === "numbered" ? -1 : 1;
  }
  return a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0;
};

const resolveSlots = (files: readonly CardFile[]): ReadonlyMap<Slot, CardFile> => {
  const bySlot = new Map<Slot, CardFile>();

  for (const file of files) {
    if (!isSlot(file.cardNumber)) {
      continue;
    }

    const current = bySlot.get(file.cardNumber);
    if (current === undefined || precedence(file, current) < 0) {
      bySlot.set(file.cardNumber, file);
    }
  }

  return bySlot;
};

export const makeDeckModel = (index: CardIndex): DeckModel => {
  const bySlot = resolveSlots(index.files);
  const files = [...bySlot.values()].sort((a, b) => a.cardNumber - b.cardNumber);

  const itemSlots = files
    .map((file) => file.cardNumber)
    .filter((slot) => slot >= ITEMS_FIRST_SLOT && slot <= LAST_SLOT);

  const fronts = itemSlots.filter((slot) => slot % 2 === 1);
  const backs = itemSlots.filter((slot) => slot % 2 === 0);

  const fileAt = (slot: Slot): Option.Option<string> =>
    Option.fromNullable(bySlot.get(slot)).pipe(Option.map((file) => file.filePath));

  return {
    rootPath: index.rootPath,
    files,
    size: files.length,
    isEmpty: files.length === 0,
    fileAt,
    cardAt: (slot, side) => (isSlot(slot) ? fileAt(slotForSide(slot, side)) : Option.none()),
    sectionOf,
    itemNumberOf,
    itemToSlot,
    availableFronts: () => fronts,
    availableBacks: () => backs,
  };
};
