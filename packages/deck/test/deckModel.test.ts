import { Either, Option } from "effect";
import { describe, expect, it } from "vitest";
import { makeDeckModel } from "../src";
import { ROOT, indexOf } from "./fixtures";

describe("makeDeckModel", () => {
  it("looks up both sides of the card containing a slot", () => {
    const deck = makeDeckModel(indexOf([21, 22, 23]));

    expect(deck.cardAt(21, "front")).toEqual(Option.some(`${ROOT}/treasure21.jpg`));
    expect(deck.cardAt(21, "back")).toEqual(Option.some(`${ROOT}/treasure22.jpg`));
    expect(deck.cardAt(22, "front")).toEqual(Option.some(`${ROOT}/treasure21.jpg`));
    expect(deck.cardAt(23, "back")).toEqual(Option.none());
  });

  it("treats out-of-range slots as absent", () => {
    const deck = makeDeckModel(indexOf([1, 2]));

    expect(deck.cardAt(0, "back")).toEqual(Option.none());
    expect(deck.cardAt(221, "front")).toEqual(Option.none());
    expect(deck.fileAt(300)).toEqual(Option.none());
  });

  it("maps the aliased first card to slot 1", () => {
    const deck = makeDeckModel({
      rootPath: ROOT,
      files: [
        { cardNumber: 1, fileName: "Cards.jpg", filePath: `${ROOT}/Cards.jpg`, origin: "alias" },
        {
          cardNumber: 2,
          fileName: "Cards2.jpg",
          filePath: `${ROOT}/Cards2.jpg`,
          origin: "numbered",
        },
      ],
      ignored: [],
    });

    expect(deck.cardAt(1, "front")).toEqual(Option.some(`${ROOT}/Cards.jpg`));
    expect(deck.cardAt(1, "back")).toEqual(Option.some(`${ROOT}/Cards2.jpg`));
  });

  it("prefers numbered files over aliases, then the first file name", () => {
    const deck = makeDeckModel({
      rootPath: ROOT,
      files: [
        { cardNumber: 1, fileName: "Cards.jpg", filePath: `${ROOT}/Cards.jpg`, origin: "alias" },
        { cardNumber: 1, fileName: "b1.jpg", filePath: `${ROOT}/b1.jpg`, origin: "numbered" },
        { cardNumber: 1, fileName: "a1.jpg", filePath: `${ROOT}/a1.jpg`, origin: "numbered" },
      ],
      ignored: [],
    });

    expect(deck.fileAt(1)).toEqual(Option.some(`${ROOT}/a1.jpg`));
    expect(deck.size).toBe(1);
  });

  it("lists available item fronts and backs only", () => {
    const deck = makeDeckModel(indexOf([1, 2, 19, 20, 21, 22, 24, 27, 219, 220]));

    expect(deck.availableFronts()).toEqual([21, 27, 219]);
    expect(deck.availableBacks()).toEqual([22, 24, 220]);
  });

  it("reports empty decks", () => {
    const deck = makeDeckModel(indexOf([]));

    expect(deck.isEmpty).toBe(true);
    expect(deck.size).toBe(0);
    expect(deck.availableFronts()).toEqual([]);
  });

  it("exposes section and item queries", () => {
    const deck = makeDeckModel(indexOf([21]));

    expect(Either.isLeft(deck.sectionOf(0))).toBe(true);
    expect(deck.itemNumberOf(24)).toEqual(Option.some(2));
    expect(deck.itemNumberOf(20)).toEqual(Option.none());
    expect(deck.itemToSlot(100)).toEqual(Either.right(219));
    expect(Either.isLeft(deck.itemToSlot(101))).toBe(true);
  });
});
