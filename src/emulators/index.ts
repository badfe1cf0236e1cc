/**
 * Emulator barrel exports.
 *
 * Usage:
 *   import { BridgeEmulator } from './emulators';
 *   const emu = new BridgeEmulator(verbose);
 *   emu.publishState({ in_game: true, game_state: { floor: 1 } });
 */

export { BridgeEmulator } from './bridge-emulator';
export type { EmulatorLogEntry } from './bridge-emulator';
