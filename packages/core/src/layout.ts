import type { TreasureRole } from "./types";

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface CropBox {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

export interface Placement {
  readonly role: TreasureRole;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface CroppedPlacement extends Placement {
  readonly role: "croppedBack";
  readonly crop: CropBox;
  /** Mat padding around the cropped region. */
  readonly inset: number;
}

export interface TreasureLayout {
  readonly canvas: Size;
  /** In paint order, bottom first. */
  readonly cards: readonly Placement[];
  readonly panel: CroppedPlacement;
}

const CARD_SIZE: Size = { width: 744, height: 1039 };

// Offsets relative to the anchor back card.
const BACK2_OFFSET = { x: 0, y: 578 } as const;
const BACK3_OFFSET = { x: -234, y: 144 } as const;
const FRONT_OFFSET = { x: 0, y: 144 } as const;

const CROP_BOX: CropBox = { left: 238, top: 233, right: 738, bottom: 575 };

const OUTER_MARGIN = 40;
const PANEL_GAP = 60;
const MAT_PADDING = 16;

export const treasureLayout = (): TreasureLayout => {
  const baseX = OUTER_MARGIN + Math.abs(BACK3_OFFSET.x);
  const baseY = OUTER_MARGIN;

  const card = (role: TreasureRole, dx: number, dy: number): Placement => ({
    role,
    x: baseX + dx,
    y: baseY + dy,
    width: CARD_SIZE.width,
    height: CARD_SIZE.height,
  });

  const cards = [
    card("back1", 0, 0),
    card("back2", BACK2_OFFSET.x, BACK2_OFFSET.y),
    card("back3", BACK3_OFFSET.x, BACK3_OFFSET.y),
    card("front", FRONT_OFFSET.x, FRONT_OFFSET.y),
  ];

  const right = Math.max(...cards.map((placement) => placement.x + placement.width));
  const bottom = Math.max(...cards.map((placement) => placement.y + placement.height));

  const cropWidth = CROP_BOX.right - CROP_BOX.left;
  const cropHeight = CROP_BOX.bottom - CROP_BOX.top;

  const panel: CroppedPlacement = {
    role: "croppedBack",
    x: right + PANEL_GAP,
    y: OUTER_MARGIN,
    width: cropWidth + MAT_PADDING * 2,
    height: cropHeight + MAT_PADDING * 2,
    crop: CROP_BOX,
    inset: MAT_PADDING,
  };

  return {
    canvas: {
      width: panel.x + cropWidth + OUTER_MARGIN,
      height: Math.max(bottom + OUTER_MARGIN, panel.y + cropHeight + OUTER_MARGIN),
    },
    cards,
    panel,
  };
};
