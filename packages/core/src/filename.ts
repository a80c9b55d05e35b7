import { Option } from "effect";

const TRAILING_DIGITS = /(\d+)$/;

export const DEFAULT_IMAGE_EXTENSIONS: readonly string[] = [".jpg", ".jpeg"];

/** `"foo_219.jpg"` -> `"foo_219"`. Dotfiles without another dot keep their name. */
export const stemOf = (fileName: string): string => {
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(0, dot) : fileName;
};

/** Lower-cased extension including the dot, or `""`. */
export const extensionOf = (fileName: string): string => {
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(dot).toLowerCase() : "";
};

export const hasImageExtension = (
  fileName: string,
  extensions: readonly string[] = DEFAULT_IMAGE_EXTENSIONS,
): boolean => {
  const extension = extensionOf(fileName);
  return extensions.some((candidate) => candidate.toLowerCase() === extension);
};

/**
 * Reads the run of digits right before the extension.
 *
 * - `"Deck_of_Endless_Treasure219.jpg"` -> `Some(219)`
 * - `"card_007.jpeg"` -> `Some(7)`
 * - `"Deck_of_Endless_Treasure.jpg"` -> `None`
 */
export const parseTrailingNumber = (fileName: string): Option.Option<number> => {
  const digits = TRAILING_DIGITS.exec(stemOf(fileName))?.[1];
  if (digits === undefined) {
    return Option.none();
  }

  const value = Number.parseInt(digits, 10);
  return Number.isSafeInteger(value) ? Option.some(value) : Option.none();
};
