import { Either, Option, Schema } from "effect";
import { InvalidItemError } from "./errors";
import { LAST_SLOT } from "./sections";
import type { CardPair, ItemNumber, Slot } from "./types";

export const FIRST_ITEM = 1;
export const LAST_ITEM = 100;
export const ITEMS_FIRST_SLOT = 21;

export const ItemNumberSchema = Schema.Number.pipe(
  Schema.int(),
  Schema.between(FIRST_ITEM, LAST_ITEM),
);

/** Decodes user input such as "12" or " 7 " into an item number. */
export const ItemNumberFromString = Schema.compose(
  Schema.compose(Schema.Trim, Schema.NumberFromString),
  ItemNumberSchema,
);

const invalidItem = (input: unknown): InvalidItemError =>
  new InvalidItemError({ input: String(input), min: FIRST_ITEM, max: LAST_ITEM });

export const parseItemNumber = (input: string): Either.Either<ItemNumber, InvalidItemError> =>
  Schema.decodeUnknownEither(ItemNumberFromString)(input).pipe(
    Either.mapLeft(() => invalidItem(input)),
  );

/** Item 1 -> 21, item 2 -> 23, item 100 -> 219. */
export const itemToSlot = (item: ItemNumber): Either.Either<Slot, InvalidItemError> =>
  Schema.decodeUnknownEither(ItemNumberSchema)(item).pipe(
    Either.mapLeft(() => invalidItem(item)),
    Either.map((valid) => ITEMS_FIRST_SLOT + 2 * (valid - 1)),
  );

export const itemPair = (item: ItemNumber): Either.Either<CardPair, InvalidItemError> =>
  Either.map(itemToSlot(item), (front) => ({ front, back: front + 1 }));

export const itemNumberOf = (slot: Slot): Option.Option<ItemNumber> =>
  Number.isInteger(slot) && slot >= ITEMS_FIRST_SLOT && slot <= LAST_SLOT
    ? Option.some(Math.floor((slot - ITEMS_FIRST_SLOT) / 2) + 1)
    : Option.none();
