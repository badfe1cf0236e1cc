/**
 * Typed projections over a state document.
 *
 * Every accessor accepts `undefined` (no state yet) and answers "not
 * available" (`undefined`, `false` or `[]`) for missing or mistyped fields.
 * Game fields live under `game_state`; session flags sit at the root.
 */

import type { JsonValue, StateDocument } from './types';

type Doc = StateDocument | undefined;

/**
 * Dotted-path lookup, e.g. `getPath(doc, 'game_state.deck.0.name')`.
 * Numeric segments index into arrays.
 */
export function getPath(doc: Doc, path: string): JsonValue | undefined {
  let current: JsonValue | undefined = doc;
  for (const segment of path.split('.')) {
    if (current === undefined || current === null || typeof current !== 'object') {
      return undefined;
    }
    if (isArray(current)) {
      const index = /^\d+$/.test(segment) ? Number(segment) : NaN;
      current = Number.isInteger(index) ? current[index] : undefined;
    } else {
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    }
  }
  return current;
}

export function isInGame(doc: Doc): boolean {
  return doc?.in_game === true;
}

export function isReadyForCommand(doc: Doc): boolean {
  return doc?.ready_for_command === true;
}

export function getAvailableCommands(doc: Doc): string[] {
  const commands = doc?.available_commands;
  if (!isArray(commands)) return [];
  return commands.filter((c): c is string => typeof c === 'string');
}

export function hasCommand(doc: Doc, name: string): boolean {
  return getAvailableCommands(doc).includes(name);
}

export function getScreenType(doc: Doc): string | undefined {
  return asString(getPath(doc, 'game_state.screen_type'));
}

export function getRoomPhase(doc: Doc): string | undefined {
  return asString(getPath(doc, 'game_state.room_phase'));
}

export function getCurrentHP(doc: Doc): number | undefined {
  return asInteger(getPath(doc, 'game_state.current_hp'));
}

export function getMaxHP(doc: Doc): number | undefined {
  return asInteger(getPath(doc, 'game_state.max_hp'));
}

export function getFloor(doc: Doc): number | undefined {
  return asInteger(getPath(doc, 'game_state.floor'));
}

export function getAct(doc: Doc): number | undefined {
  return asInteger(getPath(doc, 'game_state.act'));
}

export function getGold(doc: Doc): number | undefined {
  return asInteger(getPath(doc, 'game_state.gold'));
}

// Array.isArray does not narrow readonly arrays
function isArray(value: JsonValue | undefined): value is readonly JsonValue[] {
  return Array.isArray(value);
}

function asString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asInteger(value: JsonValue | undefined): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}
