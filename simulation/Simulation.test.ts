/**
 * Simulation Tests
 */

import { InMemoryTransport } from './InMemoryTransport';
import { SimulatedAccessory } from './SimulatedAccessory';
import { SimulatedRangingEngine } from './SimulatedRangingEngine';
import { MessageCodec, Messages } from '../uwb-protocol';
import { Capability, RangingSample } from '../ranging-math';
import { SessionInvalidationReason } from '../ranging-management';

const ACC = { id: 'acc-a', name: 'Accessory A' };

function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('InMemoryTransport with SimulatedAccessory', () => {
  let transport: InMemoryTransport;
  let received: number[][];

  function connectAccessory(accessory: SimulatedAccessory): Promise<void> {
    transport.register(accessory);
    return transport.connect(accessory.identity);
  }

  beforeEach(() => {
    transport = new InMemoryTransport();
    received = [];
    transport.on('dataReceived', ({ bytes }) => received.push(Array.from(bytes)));
  });

  test('answers Initialize as scripted, then with valid configuration', async () => {
    await connectAccessory(new SimulatedAccessory({
      identity: ACC,
      configPayload: Uint8Array.of(9, 8),
      configReplies: ['empty', 'silent', 'garbage'],
    }));
    const initialize = MessageCodec.encode(Messages.initialize());

    for (let i = 0; i < 4; i++) {
      await transport.send(ACC.id, initialize);
      await settle();
    }

    expect(received).toEqual([[0x01], [0xff, 0x00], [0x01, 9, 8]]);
  });

  test('starts on ConfigureAndStart and stops on Stop', async () => {
    const accessory = new SimulatedAccessory({ identity: ACC });
    await connectAccessory(accessory);

    await transport.send(ACC.id, MessageCodec.encode(Messages.configureAndStart(Uint8Array.of(7))));
    await settle();
    expect(accessory.currentState).toBe('ranging');
    expect(Array.from(accessory.shareableConfig ?? [])).toEqual([7]);

    await transport.send(ACC.id, MessageCodec.encode(Messages.stop()));
    await settle();
    expect(accessory.currentState).toBe('idle');
    expect(received).toEqual([[0x02], [0x03]]);
  });

  test('holds RangingStarted until told to start when autoStart is off', async () => {
    const accessory = new SimulatedAccessory({ identity: ACC, autoStart: false });
    await connectAccessory(accessory);

    await transport.send(ACC.id, MessageCodec.encode(Messages.configureAndStart(Uint8Array.of(7))));
    await settle();
    expect(accessory.currentState).toBe('configured');
    expect(received).toEqual([]);

    accessory.startRanging();
    await settle();
    expect(received).toEqual([[0x02]]);
  });

  test('refuses to connect an unregistered accessory', async () => {
    await expect(transport.connect(ACC)).rejects.toThrow('No simulated accessory registered for acc-a');
  });

  test('fails sends when not connected or when told to', async () => {
    const notConnected = await transport.send(ACC.id, Uint8Array.of(0x0a));
    expect(notConnected.success).toBe(false);

    await connectAccessory(new SimulatedAccessory({ identity: ACC }));
    transport.failNextSends(ACC.id, 1);

    const failed = await transport.send(ACC.id, Uint8Array.of(0x0a));
    const delivered = await transport.send(ACC.id, Uint8Array.of(0x0a));

    expect(failed.success).toBe(false);
    expect(delivered.success).toBe(true);
    expect(transport.sent(ACC.id).map(bytes => Array.from(bytes))).toEqual([[0x0a]]);
  });

  test('reports a dropped link and stops delivering', async () => {
    const accessory = new SimulatedAccessory({ identity: ACC });
    const disconnects: Array<{ deviceId: string; reason?: string }> = [];
    transport.on('disconnected', event => disconnects.push(event));
    await connectAccessory(accessory);

    accessory.stopUnexpectedly();
    transport.dropLink(ACC.id, 'out of range');
    await settle();

    expect(disconnects).toEqual([{ deviceId: ACC.id, reason: 'out of range' }]);
    expect(accessory.currentState).toBe('offline');
    expect(received).toEqual([]);
  });
});

describe('SimulatedRangingEngine', () => {
  test('produces a shareable configuration for each running session', async () => {
    const engine = new SimulatedRangingEngine();
    const ready: Array<{ sessionToken: string; config: number[] }> = [];
    engine.on('shareableConfigReady', ({ sessionToken, config }) => {
      ready.push({ sessionToken, config: Array.from(config) });
    });

    const result = await engine.createRangingConfiguration(ACC.id, Uint8Array.of(4, 5));
    if (!result.success) throw result.error;
    const token = engine.runRangingSession(ACC.id, result.descriptor, 'discovery-1');
    await settle();

    expect(ready).toEqual([{ sessionToken: token, config: [0x53, 0x43, 4, 5] }]);
    expect(engine.capability).toBe(Capability.FULL_DIRECTION);
  });

  test('skips the shareable configuration of a session invalidated by the host', async () => {
    const engine = new SimulatedRangingEngine();
    const ready = jest.fn();
    engine.on('shareableConfigReady', ready);

    const result = await engine.createRangingConfiguration(ACC.id, Uint8Array.of(1));
    if (!result.success) throw result.error;
    const token = engine.runRangingSession(ACC.id, result.descriptor, 'discovery-1');
    engine.invalidateSession(token);
    await settle();

    expect(ready).not.toHaveBeenCalled();
    expect(engine.invalidated).toEqual([token]);
    expect(engine.activeSessionCount).toBe(0);
  });

  test('rejects as many configurations as asked', async () => {
    const engine = new SimulatedRangingEngine();
    engine.rejectNextConfigurations(ACC.id, 2);

    const outcomes: boolean[] = [];
    for (let i = 0; i < 3; i++) {
      outcomes.push((await engine.createRangingConfiguration(ACC.id, Uint8Array.of(1))).success);
    }

    expect(outcomes).toEqual([false, false, true]);
  });

  test('fills in the discovery token and drops events for unknown devices', async () => {
    const engine = new SimulatedRangingEngine();
    const samples: RangingSample[] = [];
    engine.on('sampleUpdated', ({ sample }) => samples.push(sample));

    expect(engine.emitSample(ACC.id, { distanceMeters: 1 })).toBe(false);

    const result = await engine.createRangingConfiguration(ACC.id, Uint8Array.of(1));
    if (!result.success) throw result.error;
    engine.runRangingSession(ACC.id, result.descriptor, 'discovery-1');

    expect(engine.emitSample(ACC.id, { distanceMeters: 1 })).toBe(true);
    expect(samples).toEqual([{ distanceMeters: 1, discoveryToken: 'discovery-1' }]);
  });

  test('forgets a session it invalidated itself', async () => {
    const engine = new SimulatedRangingEngine();
    const reasons: SessionInvalidationReason[] = [];
    engine.on('sessionInvalidated', ({ reason }) => reasons.push(reason));

    const result = await engine.createRangingConfiguration(ACC.id, Uint8Array.of(1));
    if (!result.success) throw result.error;
    engine.runRangingSession(ACC.id, result.descriptor, 'discovery-1');
    engine.invalidate(ACC.id, SessionInvalidationReason.RESOURCE_TIMEOUT);
    engine.invalidate(ACC.id, SessionInvalidationReason.RESOURCE_TIMEOUT);

    expect(reasons).toEqual([SessionInvalidationReason.RESOURCE_TIMEOUT]);
    expect(engine.getSession(ACC.id)).toBeNull();
  });

  describe('motion loop', () => {
    beforeEach(() => {
      jest.useFakeTimers({ doNotFake: ['setImmediate', 'nextTick', 'queueMicrotask'] });
    });

    afterEach(() => {
      jest.clearAllTimers();
      jest.useRealTimers();
    });

    test('emits one sample per session per tick until stopped', async () => {
      const engine = new SimulatedRangingEngine({ capability: Capability.HORIZONTAL_ANGLE_ONLY });
      const samples: RangingSample[] = [];
      engine.on('sampleUpdated', ({ sample }) => samples.push(sample));

      const result = await engine.createRangingConfiguration(ACC.id, Uint8Array.of(1));
      if (!result.success) throw result.error;
      engine.runRangingSession(ACC.id, result.descriptor, 'discovery-1');

      engine.startMotion(200);
      jest.advanceTimersByTime(600);
      engine.stopMotion();
      jest.advanceTimersByTime(600);

      expect(samples).toHaveLength(3);
      expect(samples.every(sample => sample.directionVector === undefined)).toBe(true);
      expect(samples[0].horizontalAngleRad).toBeCloseTo(Math.PI / 36, 10);
    });
  });
});
