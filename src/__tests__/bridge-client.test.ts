import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import pino from 'pino';
import { BridgeClient } from '../client/bridge-client';
import type { SessionConfigInput } from '../config-schema';
import { BridgeEmulator } from '../emulators';
import type { ConnectionStatus } from '../health/types';
import type { BridgeTransport, TransportResponse } from '../transport/transport';

const silent = pino({ level: 'silent' });

function createClient(config: SessionConfigInput = {}) {
  const emu = new BridgeEmulator();
  const client = new BridgeClient({ readyBackoffMs: 10, ...config }, { transport: emu, logger: silent });
  return { emu, client };
}

/** Wraps the emulator and records when each request starts and ends */
class RecordingTransport implements BridgeTransport {
  readonly target = 'recording';
  readonly events: string[] = [];
  private inner: BridgeEmulator;

  constructor(inner: BridgeEmulator) {
    this.inner = inner;
  }

  async get(path: string, timeoutMs: number): Promise<TransportResponse> {
    this.events.push(`start GET ${path}`);
    await delay(20);
    const res = await this.inner.get(path, timeoutMs);
    this.events.push(`end GET ${path}`);
    return res;
  }

  async post(path: string, body: string, timeoutMs: number): Promise<TransportResponse> {
    this.events.push(`start POST ${path}`);
    const res = await this.inner.post(path, body, timeoutMs);
    this.events.push(`end POST ${path}`);
    return res;
  }
}

describe('BridgeClient', () => {
  describe('construction', () => {
    it('uses the emulator when emulate is set', () => {
      const client = new BridgeClient({ emulate: true }, { logger: silent });
      assert.ok(client.transport instanceof BridgeEmulator);
      assert.equal(client.transport.target, 'emulator');
    });

    it('uses HTTP otherwise', () => {
      const client = new BridgeClient({ host: 'localhost', port: 9001 }, { logger: silent });
      assert.equal(client.transport.target, 'http://localhost:9001');
    });

    it('starts disconnected with no error', () => {
      const { client } = createClient();
      assert.equal(client.getStatus(), 'DISCONNECTED');
      assert.equal(client.getConsecutiveFailures(), 0);
      assert.equal(client.getLastError(), '');
      assert.equal(client.getLastErrorKind(), undefined);
    });

    it('rejects invalid settings', () => {
      assert.throws(() => new BridgeClient({ timeoutMs: 0 }, { logger: silent }), {
        message: /^\[Config\] Validation failed:/,
      });
    });
  });

  describe('connect', () => {
    it('moves to CONNECTED on a ready bridge', async () => {
      const { client } = createClient();
      assert.equal(await client.connect(), true);
      assert.equal(client.getStatus(), 'CONNECTED');
      assert.equal(client.getConsecutiveFailures(), 0);
    });

    it('stays DISCONNECTED on a non-200 health response', async () => {
      const { emu, client } = createClient();
      emu.failNext('GET /health', 503);

      assert.equal(await client.connect(), false);
      assert.equal(client.getStatus(), 'DISCONNECTED');
      assert.equal(client.getLastError(), 'Health check failed (status 503)');
      assert.equal(client.getLastErrorKind(), 'protocol');
      assert.equal(client.getConsecutiveFailures(), 1);
    });

    it('fails when the bridge is not ready', async () => {
      const { emu, client } = createClient();
      emu.setReady(false);

      assert.equal(await client.connect(), false);
      assert.equal(client.getLastError(), 'Bridge not ready (status "starting")');
    });

    it('fails with a transport error when there is no bridge', async () => {
      const { emu, client } = createClient();
      emu.setOffline(true);

      assert.equal(await client.connect(), false);
      assert.equal(client.getLastErrorKind(), 'transport');
    });

    it('fails on an unreadable health body', async () => {
      const { emu, client } = createClient();
      emu.corruptNext('GET /health');

      assert.equal(await client.connect(), false);
      assert.equal(client.getLastErrorKind(), 'decode');
    });

    it('keeps READY when probed again', async () => {
      const { emu, client } = createClient();
      emu.publishState({ in_game: true });
      await client.connect();
      await client.getState();
      assert.equal(client.getStatus(), 'READY');

      assert.equal(await client.connect(), true);
      assert.equal(client.getStatus(), 'READY');
    });

    it('a failed probe disconnects a ready session', async () => {
      const { emu, client } = createClient();
      emu.publishState({ in_game: true });
      await client.connect();
      await client.getState();

      emu.failNext('GET /health', 500);
      assert.equal(await client.connect(), false);
      assert.equal(client.getStatus(), 'DISCONNECTED');
    });

    it('resets the failure counter', async () => {
      const { emu, client } = createClient();
      emu.failNext('GET /health', 500, 2);
      await client.connect();
      await client.connect();
      assert.equal(client.getConsecutiveFailures(), 2);

      await client.connect();
      assert.equal(client.getConsecutiveFailures(), 0);
      assert.equal(client.getLastError(), 'Health check failed (status 500)');
    });
  });

  describe('requestReadyHandshake', () => {
    it('sends GET /ready without changing status', async () => {
      const { emu, client } = createClient();
      assert.equal(await client.requestReadyHandshake(), true);
      assert.equal(emu.requestCount('GET /ready'), 1);
      assert.equal(client.getStatus(), 'DISCONNECTED');
    });

    it('counts a failed handshake', async () => {
      const { emu, client } = createClient();
      emu.failNext('GET /ready', 500);
      assert.equal(await client.requestReadyHandshake(), false);
      assert.equal(client.getLastError(), 'Ready handshake failed (status 500)');
      assert.equal(client.getConsecutiveFailures(), 1);
    });
  });

  describe('waitForReady', () => {
    it('returns true once a state arrives', async () => {
      const { emu, client } = createClient();
      const changes: ConnectionStatus[] = [];
      client.on('statusChange', (next: ConnectionStatus) => changes.push(next));

      await client.connect();
      setTimeout(() => emu.publishState({ in_game: true }), 30);

      assert.equal(await client.waitForReady(2000), true);
      assert.equal(client.getStatus(), 'READY');
      assert.deepEqual(changes, ['CONNECTED', 'WAITING_FOR_STATE', 'READY']);
    });

    it('returns true at once when already ready', async () => {
      const { emu, client } = createClient();
      emu.publishState({ in_game: true });
      await client.connect();
      await client.getState();
      const polls = emu.requestCount('GET /state');

      assert.equal(await client.waitForReady(100), true);
      assert.equal(emu.requestCount('GET /state'), polls);
    });

    it('times out without throwing or counting a failure', async () => {
      const { emu, client } = createClient();
      await client.connect();

      assert.equal(await client.waitForReady(50), false);
      assert.equal(client.getStatus(), 'WAITING_FOR_STATE');
      assert.equal(client.getLastError(), 'Timed out after 50ms waiting for game state');
      assert.equal(client.getLastErrorKind(), 'timeout');
      assert.equal(client.getConsecutiveFailures(), 0);
      assert.ok(emu.requestCount('GET /state') >= 2);
    });

    it('does not connect on its own', async () => {
      const { emu, client } = createClient();
      emu.publishState({ in_game: true });

      assert.equal(await client.waitForReady(30), false);
      assert.equal(client.getStatus(), 'DISCONNECTED');
      assert.equal(emu.requestCount('GET /health'), 0);
      assert.deepEqual(client.getCachedState(), { in_game: true });
    });

    it('ignores an empty document', async () => {
      const { emu, client } = createClient();
      emu.publishState({});
      await client.connect();

      assert.equal(await client.waitForReady(30), false);
      assert.equal(client.getStatus(), 'WAITING_FOR_STATE');
    });
  });

  describe('failure threshold', () => {
    it('disconnects after N consecutive failures and recovers through connect', async () => {
      const { emu, client } = createClient({ maxConsecutiveFailures: 3 });
      await client.connect();

      emu.setOffline(true);
      await client.getState();
      await client.getState();
      assert.equal(client.getStatus(), 'CONNECTED');
      await client.getState();
      assert.equal(client.getStatus(), 'DISCONNECTED');
      assert.equal(client.getConsecutiveFailures(), 3);

      emu.setOffline(false);
      emu.publishState({ floor: 1 });
      assert.deepEqual(await client.getState(), { floor: 1 });
      assert.equal(client.getStatus(), 'DISCONNECTED');
      assert.equal(client.getConsecutiveFailures(), 0);

      await client.connect();
      await client.getState();
      assert.equal(client.getStatus(), 'READY');
    });

    it('mixed failure kinds count together', async () => {
      const { emu, client } = createClient({ maxConsecutiveFailures: 3 });
      await client.connect();

      emu.failNext('GET /state', 500);
      emu.corruptNext('GET /state');
      await client.getState();
      await client.getState();
      await client.sendAction('end', 1.5);
      assert.equal(client.getStatus(), 'CONNECTED');

      emu.failNext('POST /action', 500);
      await client.sendAction('end');
      assert.equal(client.getStatus(), 'DISCONNECTED');
    });
  });

  describe('sendAction', () => {
    it('reports success on 200 and resets the counter', async () => {
      const { emu, client } = createClient();
      emu.failNext('GET /state', 500);
      await client.getState();
      assert.equal(client.getConsecutiveFailures(), 1);

      assert.equal(await client.sendAction('end_turn'), true);
      assert.equal(client.getConsecutiveFailures(), 0);
      assert.deepEqual(emu.getCommands(), ['end_turn']);
    });

    it('reports failure on 500', async () => {
      const { emu, client } = createClient();
      emu.failNext('POST /action', 500);

      assert.equal(await client.sendAction('end_turn'), false);
      assert.equal(client.getLastError(), 'Action "end_turn" failed (status 500)');
      assert.equal(client.getConsecutiveFailures(), 1);
    });

    it('sends arguments on one line', async () => {
      const { emu, client } = createClient();
      await client.sendAction('play', 3, 0);
      assert.deepEqual(emu.getCommands(), ['play 3 0']);
    });

    it('does not send a command it cannot encode', async () => {
      const { emu, client } = createClient();
      assert.equal(await client.sendAction('play', 1.5), false);
      assert.equal(emu.requestCount('POST /action'), 0);
      assert.equal(client.getConsecutiveFailures(), 0);
      assert.equal(client.getLastErrorKind(), 'encoding');
      assert.equal(
        client.getLastError(),
        'Cannot encode command "play": argument 0 must be an integer (got 1.5)',
      );
    });

    it('typed helpers send the matching commands', async () => {
      const { emu, client } = createClient();
      await client.startGame('IRONCLAD');
      await client.playCard(0, 1);
      await client.usePotion(2);
      await client.discardPotion(1);
      await client.endTurn();
      await client.choose('shop');
      await client.proceed();
      await client.returnTo();
      await client.waitFrames(10);
      await client.pressKey('Confirm');
      await client.click('Right', 100, 200);
      await client.requestStateRefresh();

      assert.deepEqual(emu.getCommands(), [
        'start IRONCLAD 0',
        'play 0 1',
        'potion use 2',
        'potion discard 1',
        'end',
        'choose shop',
        'proceed',
        'return',
        'wait 10',
        'key Confirm',
        'click Right 100 200',
        'state',
      ]);
    });
  });

  describe('accessors', () => {
    let emu: BridgeEmulator;
    let client: BridgeClient;

    beforeEach(() => {
      ({ emu, client } = createClient());
    });

    it('report not available before the first state', () => {
      assert.equal(client.getCachedState(), undefined);
      assert.equal(client.getScreenType(), undefined);
      assert.equal(client.getCurrentHP(), undefined);
      assert.equal(client.getMaxHP(), undefined);
      assert.equal(client.getFloor(), undefined);
      assert.equal(client.getAct(), undefined);
      assert.equal(client.getGold(), undefined);
      assert.equal(client.getRoomPhase(), undefined);
      assert.equal(client.isInGame(), false);
      assert.equal(client.isReadyForCommand(), false);
      assert.deepEqual(client.getAvailableCommands(), []);
    });

    it('read the cached state after one poll', async () => {
      emu.publishState({
        in_game: true,
        ready_for_command: true,
        available_commands: ['choose', 'return'],
        game_state: { screen_type: 'MAP', current_hp: 60, max_hp: 75, floor: 3 },
      });
      await client.getState();

      assert.equal(client.getScreenType(), 'MAP');
      assert.equal(client.getCurrentHP(), 60);
      assert.equal(client.getMaxHP(), 75);
      assert.equal(client.getFloor(), 3);
      assert.equal(client.getAct(), undefined);
      assert.equal(client.isInGame(), true);
      assert.equal(client.isReadyForCommand(), true);
      assert.equal(client.hasCommand('choose'), true);
      assert.equal(client.getPath('game_state.screen_type'), 'MAP');
    });
  });

  describe('hasNewState', () => {
    it('does not disturb dedup or counters', async () => {
      const { emu, client } = createClient();
      emu.publishState({ a: 1 }, 1);
      const first = await client.getState();

      emu.publishState({ a: 2 }, 2);
      assert.equal(await client.hasNewState(), true);
      assert.equal(client.getCachedState(), first);

      emu.setOffline(true);
      assert.equal(await client.hasNewState(), false);
      assert.equal(client.getConsecutiveFailures(), 0);
      assert.equal(client.getLastError(), '');
    });
  });

  describe('getHealth', () => {
    it('summarizes the session', async () => {
      const { emu, client } = createClient({ maxConsecutiveFailures: 4 });
      emu.publishState({ in_game: true }, 42);
      await client.connect();
      await client.getState();
      emu.failNext('POST /action', 500);
      await client.endTurn();

      const health = client.getHealth();
      assert.equal(health.target, 'emulator');
      assert.equal(health.status, 'READY');
      assert.equal(health.consecutiveFailures, 1);
      assert.equal(health.maxConsecutiveFailures, 4);
      assert.equal(health.lastError?.message, 'Action "end" failed (status 500)');
      assert.equal(health.lastMarker, 42);
      assert.ok(health.lastSuccess instanceof Date);
      assert.ok(health.lastStateAt instanceof Date);
    });
  });

  describe('events', () => {
    it('re-emits state and failure', async () => {
      const { emu, client } = createClient();
      const states: unknown[] = [];
      const failures: string[] = [];
      client.on('state', (_doc: unknown, marker: unknown) => states.push(marker));
      client.on('failure', (kind: string, message: string) => failures.push(`${kind}: ${message}`));

      emu.publishState({ a: 1 }, 7);
      await client.getState();
      await client.getState();
      emu.failNext('GET /state', 502);
      await client.getState();

      assert.deepEqual(states, [7]);
      assert.deepEqual(failures, ['protocol: State request failed (status 502)']);
    });
  });

  describe('ordering', () => {
    it('runs overlapping calls one at a time in call order', async () => {
      const emu = new BridgeEmulator();
      emu.publishState({ a: 1 });
      const transport = new RecordingTransport(emu);
      const client = new BridgeClient({}, { transport, logger: silent });

      const [state, sent] = await Promise.all([client.getState(), client.sendAction('end')]);
      assert.deepEqual(state, { a: 1 });
      assert.equal(sent, true);
      assert.deepEqual(transport.events, [
        'start GET /state',
        'end GET /state',
        'start POST /action',
        'end POST /action',
      ]);
    });

    it('keeps running after a failed operation', async () => {
      const emu = new BridgeEmulator();
      const transport = new RecordingTransport(emu);
      const client = new BridgeClient({}, { transport, logger: silent });
      emu.setOffline(true);

      const results = await Promise.all([client.connect(), client.sendAction('end')]);
      assert.deepEqual(results, [false, false]);
      assert.equal(client.getConsecutiveFailures(), 2);
    });
  });
});
