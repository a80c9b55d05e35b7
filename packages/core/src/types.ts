/** A card image position, the literal trailing number of its file (1..220). */
export type Slot = number;

/** Secondary numbering over the Items section (1..100). */
export type ItemNumber = number;

export type Side = "front" | "back";

export type SectionName = "Instructions" | "Damage" | "DC" | "Misc" | "Items";

export interface Section {
  readonly name: SectionName;
  readonly first: Slot;
  readonly last: Slot;
}

/** The two slots of one physical card. */
export interface CardPair {
  readonly front: Slot;
  readonly back: Slot;
}

export type TreasureRole = "back1" | "back2" | "back3" | "front" | "croppedBack";
