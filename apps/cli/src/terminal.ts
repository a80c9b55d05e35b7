import { emitKeypressEvents } from "node:readline";
import { createInterface } from "node:readline/promises";
import type { Actor } from "xstate";
import { keyToAction, type KeyPress } from "./keys";
import type { browserSessionMachine } from "./machines/browserSession";
import { FOLDER_PROMPT, ITEM_PROMPT, renderSession } from "./render";

export type BrowserSessionActor = Actor<typeof browserSessionMachine>;

export interface TerminalIO {
  readonly input: NodeJS.ReadStream;
  readonly output: NodeJS.WriteStream;
}

const CLEAR_SCREEN = "\x1b[2J\x1b[H";

/**
 * Drives the session from key presses until it reaches its final state.
 * Item numbers and folders are read as whole lines.
 */
export const runTerminal = (
  actor: BrowserSessionActor,
  io: TerminalIO = { input: process.stdin, output: process.stdout },
): Promise<void> =>
  new Promise<void>((resolve) => {
    const { input, output } = io;
    let prompting = false;

    const setRaw = (raw: boolean): void => {
      if (input.isTTY) {
        input.setRawMode(raw);
      }
    };

    const draw = (): void => {
      if (!prompting) {
        output.write(`${CLEAR_SCREEN}${renderSession(actor.getSnapshot())}\n`);
      }
    };

    const ask = async (question: string): Promise<string> => {
      prompting = true;
      input.off("keypress", onKeypress);
      setRaw(false);

      const rl = createInterface({ input, output });
      try {
        return await rl.question(question);
      } finally {
        rl.close();
        setRaw(true);
        input.resume();
        input.on("keypress", onKeypress);
        prompting = false;
      }
    };

    const reportPromptError = (error: unknown): void => {
      output.write(`Prompt failed: ${String(error)}\n`);
      draw();
    };

    const onKeypress = (_sequence: string | undefined, key: KeyPress | undefined): void => {
      if (key === undefined) {
        return;
      }

      const action = keyToAction(key);
      switch (action._tag) {
        case "Send":
          actor.send(action.event);
          return;
        case "PromptItem":
          ask(ITEM_PROMPT).then((item) => {
            actor.send({ type: "JUMP", item });
            draw();
          }, reportPromptError);
          return;
        case "PromptFolder":
          ask(FOLDER_PROMPT).then((folder) => {
            if (folder.trim() !== "") {
              actor.send({ type: "OPEN", folder: folder.trim() });
            }
            draw();
          }, reportPromptError);
          return;
        case "Ignore":
          return;
      }
    };

    const finish = (): void => {
      subscription.unsubscribe();
      input.off("keypress", onKeypress);
      setRaw(false);
      input.pause();
      resolve();
    };

    const subscription = actor.subscribe({
      next: (snapshot) => {
        if (snapshot.status === "active") {
          draw();
        }
      },
      error: (error) => {
        output.write(`Session failed: ${String(error)}\n`);
        finish();
      },
      complete: finish,
    });

    emitKeypressEvents(input);
    setRaw(true);
    input.on("keypress", onKeypress);
    input.resume();
    draw();
  });
