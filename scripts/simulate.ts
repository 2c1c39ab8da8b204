/**
 * Simulation demo: three accessories ranging against the simulated engine.
 *
 * Run with: npm run simulate [-- <durationSeconds>]
 * Reads .env from the project root; set UWB_BROADCAST_PORT to watch readings over WebSocket.
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { loadEngineConfig, UwbRangingService } from '../ranging-bridge';
import { formatSession } from '../ranging-management';
import { configureLogging, createLogger } from '../shared/RangingLogger';
import {
  InMemoryTransport,
  ManualHeadingProvider,
  SimulatedAccessory,
  SimulatedAccessoryOptions,
  SimulatedEnhancementProvider,
  SimulatedRangingEngine,
} from '../simulation';
import { ReadingBroadcastServer } from '../websocket-bridge';

config({ path: resolve(__dirname, '..', '.env') });

const log = createLogger('Simulate');

const ACCESSORIES: SimulatedAccessoryOptions[] = [
  { identity: { id: 'sim-001', name: 'Keys' } },
  { identity: { id: 'sim-002', name: 'Wallet' }, configReplies: ['garbage'] },
  { identity: { id: 'sim-003', name: 'Backpack' } },
];

async function main(): Promise<void> {
  const engineConfig = loadEngineConfig(process.env);
  configureLogging(engineConfig.logging);

  const durationSeconds = Number(process.argv[2] ?? 15);
  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    throw new Error(`Invalid duration: ${process.argv[2]}`);
  }

  const transport = new InMemoryTransport();
  const engine = new SimulatedRangingEngine();
  const heading = new ManualHeadingProvider(0);
  const enhancement = new SimulatedEnhancementProvider();

  const service = new UwbRangingService({
    transport,
    engine,
    heading,
    enhancement,
    settings: engineConfig.session,
  });
  service.on('sessionTerminated', ({ deviceId, cause }) => log.info(`${deviceId} terminated (${cause})`));
  service.start();

  let broadcast: ReadingBroadcastServer | null = null;
  if (engineConfig.broadcast.port !== null) {
    broadcast = new ReadingBroadcastServer(service, { debounceMs: engineConfig.broadcast.debounceMs });
    const port = await broadcast.start(engineConfig.broadcast.port);
    log.info(`Readings available at ws://localhost:${port}`);
  }

  for (const options of ACCESSORIES) {
    transport.register(new SimulatedAccessory(options));
    await service.connect(options.identity);
  }

  engine.startMotion(200);

  let headingDeg = 0;
  const statusTimer = setInterval(() => {
    headingDeg = (headingDeg + 15) % 360;
    heading.setHeading(headingDeg);
    for (const snapshot of service.listSessions()) {
      log.info(formatSession(snapshot));
    }
  }, 1000);

  let stopping = false;
  const finish = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    clearInterval(statusTimer);
    engine.stopMotion();
    await service.shutdown();
    await broadcast?.stop();
    log.info('Simulation finished');
  };

  process.once('SIGINT', () => {
    finish().catch(error => log.error('Shutdown failed:', error));
  });

  // Halfway through, stop one accessory cleanly
  await new Promise(done => setTimeout(done, (durationSeconds * 1000) / 2));
  if (!stopping) await service.requestStop('sim-003');

  await new Promise(done => setTimeout(done, (durationSeconds * 1000) / 2));
  await finish();
}

main().catch(error => {
  log.error('Simulation failed:', error);
  process.exitCode = 1;
});
