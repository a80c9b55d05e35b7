import { Random } from "effect";
import { describe, expect, it } from "vitest";
import { createActor, waitFor } from "xstate";
import { browserSessionMachine, type BrowserSessionInput } from "../../src/machines/browserSession";
import { renderSession } from "../../src/render";
import { cardNames, makeRuntime, type Folders } from "../helpers";

const ITEM_CARDS = [21, 22, 23, 24, 26, 28, 30];

const FOLDERS: Folders = {
  "/cards": ["Cards.jpg", "Cards2.jpg", ...cardNames([3, 13, ...ITEM_CARDS])],
  "/few": cardNames([21, 22, 24]),
  "/empty": ["notes.txt"],
};

const startSession = async (input: Partial<BrowserSessionInput> & { folder: string }) => {
  const actor = createActor(browserSessionMachine, {
    input: { runtime: makeRuntime(FOLDERS), ...input },
  });
  actor.start();
  await waitFor(actor, (state) => !state.matches("loading"));
  return actor;
};

describe("browserSessionMachine", () => {
  describe("loading", () => {
    it("opens the folder and starts browsing at slot 1", async () => {
      const actor = await startSession({ folder: "/cards" });
      const { context } = actor.getSnapshot();

      expect(actor.getSnapshot().value).toBe("browsing");
      expect(context.deck?.size).toBe(11);
      expect(context.nav).toEqual({ slot: 1, side: "front" });
      expect(context.error).toBeNull();
      expect(renderSession(actor.getSnapshot()).split("\n").slice(0, 4)).toEqual([
        "Deck of Endless Treasure · /cards · 11 cards",
        "",
        "Instructions · slot 1 (front) · item -",
        "/cards/Cards.jpg",
      ]);
    });

    it("asks for a folder when the path does not exist", async () => {
      const actor = await startSession({ folder: "/missing" });
      const { context } = actor.getSnapshot();

      expect(actor.getSnapshot().value).toBe("needsFolder");
      expect(context.error).toBe("Folder not found: /missing");
    });

    it("asks for a folder when it holds no card images", async () => {
      const actor = await startSession({ folder: "/empty" });

      expect(actor.getSnapshot().value).toBe("needsFolder");
      expect(actor.getSnapshot().context.error).toBe("No card images found in /empty");
    });

    it("recovers once a usable folder is opened", async () => {
      const actor = await startSession({ folder: "/missing" });

      actor.send({ type: "OPEN", folder: "/cards" });
      await waitFor(actor, (state) => state.matches("browsing"));

      expect(actor.getSnapshot().context.folder).toBe("/cards");
      expect(actor.getSnapshot().context.error).toBeNull();
    });

    it("keeps the open deck when another folder fails to load", async () => {
      const actor = await startSession({ folder: "/cards" });
      actor.send({ type: "NEXT" });

      actor.send({ type: "OPEN", folder: "/empty" });
      await waitFor(actor, (state) => !state.matches("loading"));

      const { context } = actor.getSnapshot();
      expect(actor.getSnapshot().value).toBe("browsing");
      expect(context.deck?.rootPath).toBe("/cards");
      expect(context.nav.slot).toBe(2);
      expect(context.error).toBe("No card images found in /empty");
    });

    it("starts on a seeded random slot", async () => {
      const seeded = () =>
        startSession({ folder: "/cards", start: "random", random: Random.make(5) });
      const first = await seeded();
      const second = await seeded();

      expect(first.getSnapshot().context.nav).toEqual(second.getSnapshot().context.nav);
    });
  });

  describe("browsing", () => {
    it("steps through slots and wraps around", async () => {
      const actor = await startSession({ folder: "/cards" });

      actor.send({ type: "PREV" });
      expect(actor.getSnapshot().context.nav).toEqual({ slot: 220, side: "back" });

      actor.send({ type: "NEXT" });
      actor.send({ type: "NEXT" });
      expect(actor.getSnapshot().context.nav).toEqual({ slot: 2, side: "back" });
    });

    it("jumps to section boundaries", async () => {
      const actor = await startSession({ folder: "/cards" });

      actor.send({ type: "LAST" });
      expect(actor.getSnapshot().context.nav.slot).toBe(12);

      actor.send({ type: "NEXT" });
      actor.send({ type: "LAST" });
      expect(actor.getSnapshot().context.nav.slot).toBe(14);

      actor.send({ type: "FIRST" });
      expect(actor.getSnapshot().context.nav.slot).toBe(13);
    });

    it("flips the aliased first card onto its back", async () => {
      const actor = await startSession({ folder: "/cards" });

      actor.send({ type: "FLIP" });
      expect(actor.getSnapshot().context.nav).toEqual({ slot: 2, side: "back" });
    });

    it("does not flip when the other side is missing", async () => {
      const actor = await startSession({ folder: "/cards" });

      actor.send({ type: "NEXT" });
      actor.send({ type: "NEXT" });
      actor.send({ type: "FLIP" });

      expect(actor.getSnapshot().context.nav).toEqual({ slot: 3, side: "front" });
    });

    it("jumps to an item number", async () => {
      const actor = await startSession({ folder: "/cards" });

      actor.send({ type: "JUMP", item: "2" });
      expect(actor.getSnapshot().context.nav).toEqual({ slot: 23, side: "front" });

      actor.send({ type: "JUMP", item: "3" });
      expect(actor.getSnapshot().context.nav).toEqual({ slot: 26, side: "back" });
    });

    it("rejects an invalid item and keeps its place", async () => {
      const actor = await startSession({ folder: "/cards" });
      actor.send({ type: "NEXT" });

      actor.send({ type: "JUMP", item: "101" });

      const { context } = actor.getSnapshot();
      expect(context.nav.slot).toBe(2);
      expect(context.error).toBe('Item must be a whole number from 1 to 100 (got "101")');

      actor.send({ type: "NEXT" });
      expect(actor.getSnapshot().context.error).toBeNull();
    });
  });

  describe("treasure", () => {
    it("draws a treasure and returns to browsing", async () => {
      const actor = await startSession({ folder: "/cards", random: Random.make(9) });

      actor.send({ type: "DRAW" });
      await waitFor(actor, (state) => state.matches("treasure"));

      const draw = actor.getSnapshot().context.draw;
      expect([21, 23]).toContain(draw?.front.slot);
      for (const card of draw?.backs ?? []) {
        expect([22, 24, 26, 28, 30]).toContain(card.slot);
      }
      expect(new Set(draw?.backs.map((card) => card.slot)).size).toBe(4);

      actor.send({ type: "BROWSE" });
      expect(actor.getSnapshot().value).toBe("browsing");
    });

    it("reports a folder with too few backs", async () => {
      const actor = await startSession({ folder: "/few" });

      actor.send({ type: "DRAW" });
      await waitFor(actor, (state) => !state.matches("drawing"));

      expect(actor.getSnapshot().value).toBe("browsing");
      expect(actor.getSnapshot().context.draw).toBeNull();
      expect(actor.getSnapshot().context.error).toContain("Not enough images to draw a treasure.");
    });
  });

  it("finishes on QUIT from any state", async () => {
    const actor = await startSession({ folder: "/missing" });

    actor.send({ type: "QUIT" });

    expect(actor.getSnapshot().status).toBe("done");
  });
});
