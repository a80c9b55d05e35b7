import { FIRST_ITEM, LAST_ITEM, treasureLayout, type TreasureRole } from "@treasure/core";
import {
  formatDrawSummary,
  roleLabel,
  viewOf,
  type DeckModel,
  type DrawnCard,
  type NavigatorState,
  type TreasureDraw,
} from "@treasure/deck";
import { Option } from "effect";
import type { BrowserSessionSnapshot } from "./machines/browserSession";

export const BROWSE_KEYS = [
  "[n/→] next",
  "[p/←] prev",
  "[f/Home] first",
  "[l/End] last",
  "[space] flip",
  "[j] item",
  "[t] treasure",
  "[o] folder",
  "[q] quit",
].join("  ");

export const TREASURE_KEYS = "[t] new treasure  [b] browse  [o] folder  [q] quit";

export const FOLDER_KEYS = "[o] choose folder  [q] quit";

export const NEEDS_FOLDER_MESSAGE =
  "A folder must be selected that contains your 'Deck of Endless Treasure' JPG images.";

export const ITEM_PROMPT = `Item number (${FIRST_ITEM}-${LAST_ITEM}): `;

export const FOLDER_PROMPT = "Card folder: ";

/** `Items · slot 22 (back) · item 1` */
export const formatPosition = (deck: DeckModel, nav: NavigatorState): string => {
  const view = viewOf(deck, nav);
  const item = Option.match(view.itemNumber, {
    onNone: () => "item -",
    onSome: (itemNumber) => `item ${itemNumber}`,
  });
  return `${view.section.name} · slot ${view.slot} (${view.side}) · ${item}`;
};

export const formatBrowser = (deck: DeckModel, nav: NavigatorState): string => {
  const view = viewOf(deck, nav);
  const file = Option.getOrElse(
    view.filePath,
    () => `(no ${view.side} image for slot ${view.slot})`,
  );
  return [
    `Deck of Endless Treasure · ${deck.rootPath} · ${deck.size} cards`,
    "",
    formatPosition(deck, nav),
    file,
  ].join("\n");
};

const pad = (value: string, width: number): string =>
  value.length >= width ? value : `${value}${" ".repeat(width - value.length)}`;

/** One row per card in paint order, with its position on the composite. */
export const formatTreasure = (draw: TreasureDraw): string => {
  const layout = treasureLayout();
  const [back1, back2, back3, croppedBack] = draw.backs;
  const drawn: Record<TreasureRole, DrawnCard> = {
    back1,
    back2,
    back3,
    front: draw.front,
    croppedBack,
  };

  const rows = [...layout.cards, layout.panel].map((placement) => {
    const card = drawn[placement.role];
    return [
      "  ",
      pad(roleLabel(card.role), 13),
      pad(String(card.slot), 5),
      pad(`${placement.x},${placement.y}`, 10),
      card.filePath,
    ].join("");
  });

  return [
    `Random treasure · ${layout.canvas.width}×${layout.canvas.height}`,
    "",
    ...rows,
    "",
    `  • ${formatDrawSummary(draw)}`,
  ].join("\n");
};

export const formatNeedsFolder = (folder: string, error: string | null): string =>
  [NEEDS_FOLDER_MESSAGE, "", `Tried: ${folder}`, ...(error === null ? [] : [error])].join("\n");

export const renderSession = (snapshot: BrowserSessionSnapshot): string => {
  const { context } = snapshot;
  const lines: string[] = [];

  if (snapshot.matches("needsFolder")) {
    return [formatNeedsFolder(context.folder, context.error), "", FOLDER_KEYS].join("\n");
  }

  if (snapshot.matches("browsing") && context.deck !== null) {
    lines.push(formatBrowser(context.deck, context.nav), "", BROWSE_KEYS);
  } else if (snapshot.matches("treasure") && context.draw !== null) {
    lines.push(formatTreasure(context.draw), "", TREASURE_KEYS);
  } else if (snapshot.matches("drawing")) {
    lines.push("Drawing a treasure…");
  } else {
    lines.push(`Loading cards from ${context.folder}…`);
  }

  if (context.error !== null) {
    lines.push("", `! ${context.error}`);
  }

  return lines.join("\n");
};
