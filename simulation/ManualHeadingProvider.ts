import type { IHeadingProvider } from '../ranging-bridge/interfaces/IHeadingProvider';

// Heading set by hand (tests, demo); null until set
export class ManualHeadingProvider implements IHeadingProvider {
  private heading: number | null;

  constructor(initialDegrees: number | null = null) {
    this.heading = initialDegrees;
  }

  setHeading(degrees: number | null): void {
    this.heading = degrees;
  }

  currentHeadingDegrees(): number | null {
    return this.heading;
  }
}
