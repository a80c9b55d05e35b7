import type { BrowserSessionEvent } from "./machines/browserSession";

/** What a key press asks for: a machine event, a prompt, or nothing. */
export type KeyAction =
  | { readonly _tag: "Send"; readonly event: BrowserSessionEvent }
  | { readonly _tag: "PromptItem" }
  | { readonly _tag: "PromptFolder" }
  | { readonly _tag: "Ignore" };

export interface KeyPress {
  readonly name?: string;
  readonly sequence?: string;
  readonly ctrl?: boolean;
}

const send = (event: BrowserSessionEvent): KeyAction => ({ _tag: "Send", event });

export const keyToAction = (key: KeyPress): KeyAction => {
  if (key.ctrl === true && key.name === "c") {
    return send({ type: "QUIT" });
  }

  switch (key.name) {
    case "n":
    case "right":
      return send({ type: "NEXT" });
    case "p":
    case "left":
      return send({ type: "PREV" });
    case "f":
    case "home":
      return send({ type: "FIRST" });
    case "l":
    case "end":
      return send({ type: "LAST" });
    case "space":
      return send({ type: "FLIP" });
    case "t":
      return send({ type: "DRAW" });
    case "b":
    case "escape":
      return send({ type: "BROWSE" });
    case "j":
      return { _tag: "PromptItem" };
    case "o":
      return { _tag: "PromptFolder" };
    case "q":
      return send({ type: "QUIT" });
    default:
      return { _tag: "Ignore" };
  }
};
