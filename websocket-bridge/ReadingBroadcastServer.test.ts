/**
 * Reading Broadcast Server Tests
 * Real ws server on an ephemeral localhost port, fed by an in-memory source.
 */

import { WebSocket } from 'ws';
import { ReadingBroadcastServer, ReadingSource } from './ReadingBroadcastServer';
import { MESSAGE_TYPES } from './types/MessageTypes';
import {
  EnhancementState,
  ErrorReason,
  RegistryEvents,
  SessionSnapshot,
  SessionState,
  TerminationCause,
} from '../ranging-management';
import { Capability, CONVERGENCE_NOT_STARTED, RangingReading } from '../ranging-math';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

class FakeSource extends TypedEventEmitter<RegistryEvents> implements ReadingSource {
  sessions: SessionSnapshot[] = [];

  listSessions(): SessionSnapshot[] {
    return this.sessions;
  }
}

const READING: RangingReading = {
  distanceMeters: 1.25,
  directionVector: { x: 0, y: 0, z: 1 },
  horizontalAngleRad: null,
  verticalEstimate: null,
  azimuthDeg: 0,
  elevation: { kind: 'angle', degrees: 0 },
  relativeBearingDeg: null,
  isStale: false,
  isValid: true,
  capturedAt: 2000,
};

function snapshot(id: string, name: string, state: SessionState, reading: RangingReading | null = null): SessionSnapshot {
  return {
    identity: { id, name },
    handle: { deviceId: id, handleId: `handle-${id}`, createdAt: 1000 },
    state,
    previousState: null,
    stateChangedAt: 1000,
    configAttempts: 0,
    handshakeCycles: 1,
    discoveryToken: null,
    capability: Capability.FULL_DIRECTION,
    convergence: CONVERGENCE_NOT_STARTED,
    lastReading: reading,
    lastActivity: 2000,
    error: null,
    enhancement: EnhancementState.DETACHED,
    stopRequested: false,
  };
}

interface TestClient {
  socket: WebSocket;
  next(): Promise<unknown>;
}

async function connectClient(port: number): Promise<TestClient> {
  const socket = new WebSocket(`ws://127.0.0.1:${port}`);
  const queue: unknown[] = [];
  const waiters: Array<(message: unknown) => void> = [];

  socket.on('message', data => {
    const message: unknown = JSON.parse(data.toString());
    const waiter = waiters.shift();
    if (waiter) {
      waiter(message);
    } else {
      queue.push(message);
    }
  });

  await new Promise<void>((resolve, reject) => {
    socket.once('open', () => resolve());
    socket.once('error', reject);
  });

  return {
    socket,
    next: () =>
      queue.length > 0
        ? Promise.resolve(queue.shift())
        : new Promise(resolve => waiters.push(resolve)),
  };
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// ─────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────

describe('ReadingBroadcastServer', () => {
  let source: FakeSource;
  let server: ReadingBroadcastServer;
  let port: number;
  const clients: TestClient[] = [];

  async function client(): Promise<TestClient> {
    const connected = await connectClient(port);
    clients.push(connected);
    return connected;
  }

  beforeEach(async () => {
    source = new FakeSource();
    server = new ReadingBroadcastServer(source, { host: '127.0.0.1', debounceMs: 10 });
    port = await server.start(0);
  });

  afterEach(async () => {
    for (const connected of clients.splice(0)) {
      connected.socket.terminate();
    }
    await server.stop();
  });

  test('binds an ephemeral port', () => {
    expect(port).toBeGreaterThan(0);
  });

  test('sends the current readings on connect', async () => {
    source.sessions = [snapshot('acc-a', 'Accessory A', SessionState.RANGING, READING)];

    const first = await (await client()).next();

    expect(first).toEqual({
      type: MESSAGE_TYPES.READINGS_UPDATE,
      timestamp: expect.any(Number),
      devices: [
        {
          deviceId: 'acc-a',
          name: 'Accessory A',
          state: 'ranging',
          stateDisplayName: 'Ranging',
          enhancement: 'detached',
          error: null,
          lastActivity: 2000,
          reading: READING,
        },
      ],
    });
  });

  test('includes the error of a session in ERROR', async () => {
    source.sessions = [{
      ...snapshot('acc-b', 'Accessory B', SessionState.ERROR),
      error: { reason: ErrorReason.INVALID_CONFIGURATION, message: 'rejected', timestamp: 1500 },
    }];

    const first = await (await client()).next();

    expect(first).toMatchObject({
      devices: [{ stateDisplayName: 'Error', error: { reason: 'invalid_configuration', message: 'rejected', timestamp: 1500 } }],
    });
  });

  test('coalesces a burst of changes into one broadcast', async () => {
    const connected = await client();
    expect(await connected.next()).toMatchObject({ devices: [] });

    source.sessions = [snapshot('acc-a', 'Accessory A', SessionState.RANGING, READING)];
    const update = { deviceId: 'acc-a', deviceName: 'Accessory A', reading: READING };
    source.emit('readingUpdated', update);
    source.emit('readingUpdated', update);
    source.emit('readingUpdated', update);

    expect(await connected.next()).toMatchObject({
      type: MESSAGE_TYPES.READINGS_UPDATE,
      devices: [{ deviceId: 'acc-a' }],
    });

    await delay(50);
    expect(server.sentCount).toBe(2);
  });

  test('broadcasts when a session terminates', async () => {
    source.sessions = [snapshot('acc-a', 'Accessory A', SessionState.RANGING)];
    const connected = await client();
    await connected.next();

    const final = snapshot('acc-a', 'Accessory A', SessionState.DISCONNECTED);
    source.sessions = [];
    source.emit('sessionTerminated', { deviceId: 'acc-a', cause: TerminationCause.DISCONNECTED, snapshot: final });

    expect(await connected.next()).toMatchObject({ devices: [] });
  });

  test('a termination goes out at once and drops the queued broadcast', async () => {
    source.sessions = [snapshot('acc-a', 'Accessory A', SessionState.RANGING, READING)];
    const connected = await client();
    await connected.next();

    source.emit('readingUpdated', { deviceId: 'acc-a', deviceName: 'Accessory A', reading: READING });
    source.sessions = [];
    source.emit('sessionTerminated', {
      deviceId: 'acc-a',
      cause: TerminationCause.STOPPED,
      snapshot: snapshot('acc-a', 'Accessory A', SessionState.DISCONNECTED),
    });

    expect(await connected.next()).toMatchObject({ devices: [] });
    await delay(50);
    expect(server.sentCount).toBe(2);
  });

  test('forceBroadcast sends without waiting for the debounce', async () => {
    const connected = await client();
    await connected.next();
    source.sessions = [snapshot('acc-d', 'Accessory D', SessionState.RANGING, READING)];

    server.queueBroadcast();
    server.forceBroadcast();

    expect(await connected.next()).toMatchObject({ devices: [{ deviceId: 'acc-d' }] });
    await delay(50);
    expect(server.sentCount).toBe(2);
  });

  test('answers ping with pong', async () => {
    const connected = await client();
    await connected.next();

    connected.socket.send(JSON.stringify({ type: MESSAGE_TYPES.PING, requestId: 7 }));

    expect(await connected.next()).toEqual({
      type: MESSAGE_TYPES.PONG,
      timestamp: expect.any(Number),
      requestId: 7,
    });
  });

  test('answers a readings request', async () => {
    const connected = await client();
    await connected.next();
    source.sessions = [snapshot('acc-c', 'Accessory C', SessionState.STARTING)];

    connected.socket.send(JSON.stringify({ type: MESSAGE_TYPES.GET_READINGS_REQUEST }));

    expect(await connected.next()).toMatchObject({
      type: MESSAGE_TYPES.READINGS_UPDATE,
      devices: [{ deviceId: 'acc-c', stateDisplayName: 'Starting', reading: null }],
    });
  });

  test('rejects malformed and unknown messages', async () => {
    const connected = await client();
    await connected.next();

    connected.socket.send('not json');
    expect(await connected.next()).toMatchObject({
      type: MESSAGE_TYPES.ERROR,
      error: 'Message is not valid JSON',
    });

    connected.socket.send(JSON.stringify({ type: 0x99 }));
    const unknown = await connected.next();
    expect(unknown).toMatchObject({ type: MESSAGE_TYPES.ERROR });
    expect(unknown).toHaveProperty('error', expect.stringMatching(/^Unsupported message: /));
  });

  test('refuses a second start', async () => {
    await expect(server.start(0)).rejects.toThrow('Broadcast server already running');
  });

  test('stops listening to the source on stop', async () => {
    const connected = await client();
    await connected.next();

    await server.stop();

    expect(source.listenerCount('readingUpdated')).toBe(0);
    expect(source.listenerCount('sessionStateChanged')).toBe(0);
    expect(source.listenerCount('sessionTerminated')).toBe(0);
    expect(server.clientCount).toBe(0);
  });
});
