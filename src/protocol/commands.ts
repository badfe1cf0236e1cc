/**
 * Action command encoding
 *
 * The bridge forwards one text line per action to the game:
 *   POST /action  { "command": "play 2 0" }
 *
 * encodeCommand() validates and joins a command name with its arguments;
 * the builders below produce the commands the game understands.
 */

import { CommandEncodingError } from '../errors';

export type CommandArg = number | string;

/** A command name plus arguments, not yet encoded */
export interface ActionCommand {
  readonly command: string;
  readonly args: readonly CommandArg[];
}

export type MouseButton = 'Left' | 'Right';

/**
 * Join a command and its arguments into one line.
 * Throws CommandEncodingError when the result would not survive the bridge.
 */
export function encodeCommand(command: string, args: readonly CommandArg[] = []): string {
  if (command === '' || /\s/.test(command)) {
    throw new CommandEncodingError(command, 'command must be a single non-empty token');
  }

  const parts = [command];
  args.forEach((arg, i) => {
    if (typeof arg === 'number') {
      if (!Number.isSafeInteger(arg)) {
        throw new CommandEncodingError(command, `argument ${i} must be an integer (got ${arg})`);
      }
      parts.push(String(arg));
    } else {
      if (arg === '' || /[\r\n]/.test(arg)) {
        throw new CommandEncodingError(command, `argument ${i} must be a non-empty single-line string`);
      }
      parts.push(arg);
    }
  });
  return parts.join(' ');
}

/** JSON body for POST /action */
export function encodeActionBody(command: string, args: readonly CommandArg[] = []): string {
  return JSON.stringify({ command: encodeCommand(command, args) });
}

function cmd(command: string, ...args: Array<CommandArg | undefined>): ActionCommand {
  return { command, args: args.filter((a): a is CommandArg => a !== undefined) };
}

export const Commands = {
  play: (cardIndex: number, targetIndex?: number) => cmd('play', cardIndex, targetIndex),
  end: () => cmd('end'),
  usePotion: (slot: number, targetIndex?: number) => cmd('potion', 'use', slot, targetIndex),
  discardPotion: (slot: number) => cmd('potion', 'discard', slot),
  choose: (choice: number | string) => cmd('choose', choice),
  proceed: () => cmd('proceed'),
  confirm: () => cmd('confirm'),
  skip: () => cmd('skip'),
  cancel: () => cmd('cancel'),
  leave: () => cmd('leave'),
  return: () => cmd('return'),
  start: (character: string, ascension = 0, seed?: string) => cmd('start', character, ascension, seed),
  state: () => cmd('state'),
  wait: (frames: number) => cmd('wait', frames),
  key: (key: string, timeout?: number) => cmd('key', key, timeout),
  click: (button: MouseButton, x: number, y: number) => cmd('click', button, x, y),
} as const;
