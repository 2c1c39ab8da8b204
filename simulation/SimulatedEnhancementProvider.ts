import type { IEnhancementProvider } from '../ranging-bridge/interfaces/IEnhancementProvider';

// Enhancement resource that attaches while `available` is set
export class SimulatedEnhancementProvider implements IEnhancementProvider {
  available = true;
  releaseCount = 0;

  private attached = new Set<string>();

  async attach(deviceId: string, _sessionToken: string): Promise<boolean> {
    if (!this.available) return false;
    this.attached.add(deviceId);
    return true;
  }

  detach(deviceId: string): void {
    this.attached.delete(deviceId);
  }

  releaseAll(): void {
    this.releaseCount++;
    this.attached.clear();
  }

  isAttached(deviceId: string): boolean {
    return this.attached.has(deviceId);
  }
}
