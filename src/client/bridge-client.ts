/**
 * BridgeClient
 *
 * One session against one bridge. Composes the health prober, state
 * synchronizer, failure tracker, status machine and action dispatcher.
 *
 * No operation throws for bridge conditions: results come back as
 * booleans or `undefined`, with details in getLastError(). Overlapping
 * calls on one client run one at a time, in the order they were made.
 *
 * Events:
 *   statusChange (next, prev)
 *   state        (document, marker)
 *   failure      (kind, message, consecutiveFailures)
 */

import { EventEmitter } from 'events';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { loadConfig, resolveSessionConfig, type SessionConfig } from '../config';
import type { SessionConfigInput } from '../config-schema';
import { ReadyTimeoutError, type FailureKind } from '../errors';
import { ConnectionStatusMachine, FailureTracker, type ConnectionStatus, type SessionHealth } from '../health';
import { getLogger, initLogger } from '../logger';
import { Commands, type ActionCommand, type CommandArg, type MouseButton } from '../protocol/commands';
import { ActionDispatcher, HealthProber, StateSynchronizer, type SessionContext } from '../session';
import * as accessors from '../state/accessors';
import type { JsonValue, StateDocument } from '../state/types';
import { createTransport, type BridgeTransport } from '../transport';

export const DEFAULT_READY_TIMEOUT_MS = 30000;

export interface BridgeClientOptions {
  /** Use this transport instead of the one the config selects */
  transport?: BridgeTransport;
  /** Parent logger; defaults to the `Bridge` module logger */
  logger?: Logger;
}

export class BridgeClient extends EventEmitter {
  readonly config: SessionConfig;
  readonly transport: BridgeTransport;

  private log: Logger;
  private status: ConnectionStatusMachine;
  private tracker: FailureTracker;
  private prober: HealthProber;
  private sync: StateSynchronizer;
  private dispatcher: ActionDispatcher;
  private queue: Promise<void> = Promise.resolve();

  constructor(config: SessionConfigInput = {}, options: BridgeClientOptions = {}) {
    super();
    this.config = resolveSessionConfig(config);
    this.transport = options.transport ?? createTransport(this.config);

    this.log = (options.logger ?? getLogger('Bridge')).child({ target: this.transport.target });
    if (this.config.debug && this.log.isLevelEnabled('info')) {
      this.log.level = 'debug';
    }

    this.status = new ConnectionStatusMachine(this.log);
    this.tracker = new FailureTracker(this.config.maxConsecutiveFailures, this.status, this.log);

    const ctx: SessionContext = {
      transport: this.transport,
      timeoutMs: this.config.timeoutMs,
      tracker: this.tracker,
      status: this.status,
      log: this.log,
    };
    this.prober = new HealthProber(ctx);
    this.sync = new StateSynchronizer(ctx);
    this.dispatcher = new ActionDispatcher(ctx);

    this.status.on('statusChange', (next: ConnectionStatus, prev: ConnectionStatus) => {
      this.emit('statusChange', next, prev);
    });
    this.sync.on('state', (document: StateDocument, marker: unknown) => {
      this.emit('state', document, marker);
    });
    this.tracker.on('failure', (kind: FailureKind, message: string, count: number) => {
      this.emit('failure', kind, message, count);
    });
  }

  /**
   * Build a client from a YAML config file plus BRIDGE_* environment
   * overrides. Also initializes the root logger from the file's logging
   * section.
   */
  static fromConfigFile(configPath?: string, options: BridgeClientOptions = {}): BridgeClient {
    const config = loadConfig(configPath);
    initLogger(config.logging);
    return new BridgeClient(config.bridge, options);
  }

  // --- Session operations ---

  /** Probe /health; on success DISCONNECTED becomes CONNECTED */
  connect(): Promise<boolean> {
    return this.exclusive(() => this.prober.connect());
  }

  /** Send the manual ready handshake (GET /ready) */
  requestReadyHandshake(): Promise<boolean> {
    return this.exclusive(() => this.prober.requestReadyHandshake());
  }

  /** Poll /state; `undefined` when the bridge has none yet or the poll failed */
  getState(): Promise<StateDocument | undefined> {
    return this.exclusive(() => this.sync.getState());
  }

  /** Check for an unseen snapshot without touching the cache or counters */
  hasNewState(): Promise<boolean> {
    return this.exclusive(() => this.sync.hasNewState());
  }

  /**
   * Poll until the session is READY or `timeoutMs` has passed. Does not
   * probe health first: a DISCONNECTED session waits out the timeout.
   */
  async waitForReady(timeoutMs = DEFAULT_READY_TIMEOUT_MS): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    const alreadyReady = await this.exclusive(async () => {
      if (this.getStatus() === 'READY') return true;
      this.status.markWaiting();
      return false;
    });
    if (alreadyReady) return true;

    for (;;) {
      await this.exclusive(() => this.sync.getState());
      if (this.getStatus() === 'READY') return true;

      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      await delay(Math.min(this.config.readyBackoffMs, remaining));
    }

    const timeout = new ReadyTimeoutError(timeoutMs);
    this.tracker.noteError(timeout.kind, timeout.message);
    this.log.warn(timeout.message);
    return false;
  }

  /** POST one command, e.g. sendAction('play', 2, 0) */
  sendAction(command: string, ...args: CommandArg[]): Promise<boolean> {
    return this.exclusive(() => this.dispatcher.sendAction(command, args));
  }

  // --- Typed actions ---

  playCard(cardIndex: number, targetIndex?: number): Promise<boolean> {
    return this.dispatch(Commands.play(cardIndex, targetIndex));
  }

  endTurn(): Promise<boolean> {
    return this.dispatch(Commands.end());
  }

  usePotion(slot: number, targetIndex?: number): Promise<boolean> {
    return this.dispatch(Commands.usePotion(slot, targetIndex));
  }

  discardPotion(slot: number): Promise<boolean> {
    return this.dispatch(Commands.discardPotion(slot));
  }

  /** Pick a choice by index or by its label */
  choose(choice: number | string): Promise<boolean> {
    return this.dispatch(Commands.choose(choice));
  }

  proceed(): Promise<boolean> {
    return this.dispatch(Commands.proceed());
  }

  confirm(): Promise<boolean> {
    return this.dispatch(Commands.confirm());
  }

  skip(): Promise<boolean> {
    return this.dispatch(Commands.skip());
  }

  cancel(): Promise<boolean> {
    return this.dispatch(Commands.cancel());
  }

  leave(): Promise<boolean> {
    return this.dispatch(Commands.leave());
  }

  returnTo(): Promise<boolean> {
    return this.dispatch(Commands.return());
  }

  startGame(character: string, ascension = 0, seed?: string): Promise<boolean> {
    return this.dispatch(Commands.start(character, ascension, seed));
  }

  /** Ask the game to re-send its state */
  requestStateRefresh(): Promise<boolean> {
    return this.dispatch(Commands.state());
  }

  waitFrames(frames: number): Promise<boolean> {
    return this.dispatch(Commands.wait(frames));
  }

  pressKey(key: string, timeout?: number): Promise<boolean> {
    return this.dispatch(Commands.key(key, timeout));
  }

  click(button: MouseButton, x: number, y: number): Promise<boolean> {
    return this.dispatch(Commands.click(button, x, y));
  }

  // --- Read-only views ---

  getStatus(): ConnectionStatus {
    return this.status.status;
  }

  getConsecutiveFailures(): number {
    return this.tracker.consecutiveFailures;
  }

  /** Most recent failure message, or '' when nothing has failed */
  getLastError(): string {
    return this.tracker.lastError?.message ?? '';
  }

  getLastErrorKind(): FailureKind | undefined {
    return this.tracker.lastError?.kind;
  }

  /** Cached document, without a request */
  getCachedState(): StateDocument | undefined {
    return this.sync.cached?.document;
  }

  getHealth(): SessionHealth {
    const cached = this.sync.cached;
    return {
      target: this.transport.target,
      status: this.status.status,
      consecutiveFailures: this.tracker.consecutiveFailures,
      maxConsecutiveFailures: this.tracker.maxConsecutiveFailures,
      lastError: this.tracker.lastError,
      lastSuccess: this.tracker.lastSuccess,
      lastMarker: cached?.marker ?? null,
      lastStateAt: cached ? new Date(cached.receivedAt) : null,
    };
  }

  // --- Accessors over the cached state ---

  isInGame(): boolean {
    return accessors.isInGame(this.getCachedState());
  }

  isReadyForCommand(): boolean {
    return accessors.isReadyForCommand(this.getCachedState());
  }

  getAvailableCommands(): string[] {
    return accessors.getAvailableCommands(this.getCachedState());
  }

  hasCommand(name: string): boolean {
    return accessors.hasCommand(this.getCachedState(), name);
  }

  getScreenType(): string | undefined {
    return accessors.getScreenType(this.getCachedState());
  }

  getCurrentHP(): number | undefined {
    return accessors.getCurrentHP(this.getCachedState());
  }

  getMaxHP(): number | undefined {
    return accessors.getMaxHP(this.getCachedState());
  }

  getFloor(): number | undefined {
    return accessors.getFloor(this.getCachedState());
  }

  getAct(): number | undefined {
    return accessors.getAct(this.getCachedState());
  }

  getGold(): number | undefined {
    return accessors.getGold(this.getCachedState());
  }

  getRoomPhase(): string | undefined {
    return accessors.getRoomPhase(this.getCachedState());
  }

  getPath(path: string): JsonValue | undefined {
    return accessors.getPath(this.getCachedState(), path);
  }

  // --- Internals ---

  private dispatch(action: ActionCommand): Promise<boolean> {
    return this.sendAction(action.command, ...action.args);
  }

  /** Run after every operation issued before it */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
