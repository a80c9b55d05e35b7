import type { CardFile, CardIndex } from "../src";

export const ROOT = "/cards";

export const cardFile = (
  cardNumber: number,
  origin: CardFile["origin"] = "numbered",
): CardFile => ({
  cardNumber,
  fileName: `treasure${cardNumber}.jpg`,
  filePath: `${ROOT}/treasure${cardNumber}.jpg`,
  origin,
});

export const indexOf = (numbers: readonly number[]): CardIndex => ({
  rootPath: ROOT,
  files: numbers.map((cardNumber) => cardFile(cardNumber)),
  ignored: [],
});

/** Every slot 1..220 present. */
export const fullDeckNumbers: readonly number[] = Array.from(
  { length: 220 },
  (_, index) => index + 1,
);
