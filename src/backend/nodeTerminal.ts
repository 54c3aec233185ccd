/**
 * Node terminal adapter
 *
 * Maps process.stdin/stdout to the xterm-compatible TerminalLike, so the
 * terminal backend runs directly in any terminal emulator.
 */

import type { IDisposable } from '@xterm/xterm';
import type { TerminalLike } from './terminal';

export interface NodeTerminal extends TerminalLike {
  /** Leave raw mode and stop reading; safe to call more than once */
  restore(): void;
}

type Listener<T> = (value: T) => void;

function subscribe<T>(listeners: Listener<T>[], listener: Listener<T>): IDisposable {
  listeners.push(listener);
  return {
    dispose: () => {
      const idx = listeners.indexOf(listener);
      if (idx !== -1) listeners.splice(idx, 1);
    },
  };
}

export function createNodeTerminal(
  input: NodeJS.ReadStream = process.stdin,
  output: NodeJS.WriteStream = process.stdout
): NodeTerminal {
  const dataListeners: Listener<string>[] = [];
  const resizeListeners: Listener<{ cols: number; rows: number }>[] = [];
  let restored = false;

  if (input.isTTY) {
    input.setRawMode(true);
  }
  input.resume();
  input.setEncoding('utf8');

  const onData = (data: string) => {
    for (const listener of [...dataListeners]) {
      listener(data);
    }
  };

  const onResize = () => {
    const size = { cols: output.columns || 80, rows: output.rows || 24 };
    for (const listener of [...resizeListeners]) {
      listener(size);
    }
  };

  input.on('data', onData);
  output.on('resize', onResize);

  return {
    write: (data: string) => {
      output.write(data);
    },
    get cols() { return output.columns || 80; },
    get rows() { return output.rows || 24; },
    onData: listener => subscribe(dataListeners, listener),
    onResize: listener => subscribe(resizeListeners, listener),
    restore: () => {
      if (restored) return;
      restored = true;
      input.off('data', onData);
      output.off('resize', onResize);
      if (input.isTTY) {
        input.setRawMode(false);
      }
      input.pause();
    },
  };
}
