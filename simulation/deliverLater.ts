import { createLogger } from '../shared/RangingLogger';

const log = createLogger('Simulation');

// Runs after the caller's current job, like a radio round trip
export function deliverLater(label: string, deliver: () => void): void {
  Promise.resolve()
    .then(deliver)
    .catch(error => log.error(`${label} delivery failed:`, error));
}
