export type {
  Slot,
  ItemNumber,
  Side,
  SectionName,
  Section,
  CardPair,
  TreasureRole,
} from "./types";

export {
  OutOfRangeError,
  InvalidItemError,
} from "./errors";

export {
  FIRST_SLOT,
  LAST_SLOT,
  SECTIONS,
  isSlot,
  sectionIndexOf,
  sectionOf,
  sideOfSlot,
  otherSide,
  pairOf,
  slotForSide,
} from "./sections";

export {
  FIRST_ITEM,
  LAST_ITEM,
  ITEMS_FIRST_SLOT,
  ItemNumberSchema,
  ItemNumberFromString,
  parseItemNumber,
  itemToSlot,
  itemPair,
  itemNumberOf,
} from "./items";

export {
  DEFAULT_IMAGE_EXTENSIONS,
  stemOf,
  extensionOf,
  hasImageExtension,
  parseTrailingNumber,
} from "./filename";

export {
  treasureLayout,
  type Size,
  type CropBox,
  type Placement,
  type CroppedPlacement,
  type TreasureLayout,
} from "./layout";
