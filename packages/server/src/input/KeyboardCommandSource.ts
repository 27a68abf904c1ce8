/**
 * @fileoverview Single-key commands from the terminal.
 *
 * The terminal is put in raw mode while the source is open, so Ctrl+C
 * arrives as a keypress and is turned into `quit`. A quit also fires the
 * `onQuit` handler at once, without waiting for the next frame.
 */

import { emitKeypressEvents } from 'node:readline';
import type { Readable } from 'node:stream';
import type { TrackerCommand } from '@hand-squeeze/shared';
import type { KeyBindings } from '../config/trackerConfig.js';
import type { CommandSource } from '../runtime/types.js';

/**
 * Map a typed character to its command, or null if the key is unbound.
 */
export function commandForKey(key: string, bindings: KeyBindings): TrackerCommand | null {
  switch (key) {
    case bindings.quit:
      return { kind: 'quit' };
    case bindings.lockMinLeft:
      return { kind: 'lock_min', hand: 'Left' };
    case bindings.lockMaxLeft:
      return { kind: 'lock_max', hand: 'Left' };
    case bindings.lockMinRight:
      return { kind: 'lock_min', hand: 'Right' };
    case bindings.lockMaxRight:
      return { kind: 'lock_max', hand: 'Right' };
    case bindings.clear:
      return { kind: 'clear' };
    default:
      return null;
  }
}

/**
 * Input stream the keyboard source reads from; `process.stdin` in production.
 */
export type KeyInput = Readable & {
  isTTY?: boolean | undefined;
  setRawMode?: ((mode: boolean) => unknown) | undefined;
};

interface KeypressInfo {
  name?: string | undefined;
  ctrl?: boolean | undefined;
}

export class KeyboardCommandSource implements CommandSource {
  private readonly pending: TrackerCommand[] = [];
  private listening = false;
  private quitHandler: (() => void) | null = null;

  constructor(
    private readonly bindings: KeyBindings,
    private readonly input: KeyInput = process.stdin
  ) {}

  start(): void {
    if (this.listening) {
      return;
    }
    this.listening = true;
    emitKeypressEvents(this.input);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.on('keypress', this.onKeypress);
    this.input.resume();
  }

  /**
   * Call `handler` as soon as a quit key is pressed.
   */
  onQuit(handler: () => void): void {
    this.quitHandler = handler;
  }

  poll(): TrackerCommand | null {
    return this.pending.shift() ?? null;
  }

  close(): void {
    if (!this.listening) {
      return;
    }
    this.listening = false;
    this.input.off('keypress', this.onKeypress);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
  }

  private readonly onKeypress = (text: string | undefined, key: KeypressInfo | undefined): void => {
    const command: TrackerCommand | null =
      key?.ctrl && key.name === 'c'
        ? { kind: 'quit' }
        : text
          ? commandForKey(text, this.bindings)
          : null;
    if (!command) {
      return;
    }
    this.pending.push(command);
    if (command.kind === 'quit') {
      this.quitHandler?.();
    }
  };
}

/**
 * Poll several command sources as one, in the order given.
 */
export function mergeCommandSources(...sources: CommandSource[]): CommandSource {
  return {
    poll(): TrackerCommand | null {
      for (const source of sources) {
        const command = source.poll();
        if (command) {
          return command;
        }
      }
      return null;
    },
    close(): void {
      for (const source of sources) {
        source.close();
      }
    },
  };
}
