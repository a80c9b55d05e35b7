export {
  scanCards,
  CardFileSchema,
  CardIndexSchema,
  IndexingFailureReason,
  IndexingError,
  type CardFile,
  type CardIndex,
  type ScanCardsOptions,
} from "./scanCards";

export { makeDeckModel, type DeckModel } from "./deckModel";

export { CardIndexer, CardIndexerLive } from "./CardIndexer";

export {
  atSlot,
  initialState,
  next,
  prev,
  firstInSection,
  lastInSection,
  flip,
  jumpToItem,
  viewOf,
  type NavigatorState,
  type NavigatorView,
  type StartPosition,
  type InitialStateOptions,
} from "./navigator";

export {
  TreasureComposer,
  TreasureComposerLive,
  InsufficientCardsError,
  REQUIRED_FRONTS,
  REQUIRED_BACKS,
  composeTreasure,
  formatDrawSummary,
  roleLabel,
  type ComposeOptions,
  type DrawnCard,
  type TreasureDraw,
} from "./treasureComposer";
