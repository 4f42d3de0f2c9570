/**
 * Health data boundary. A provider returns null when the user has not
 * enabled health integration.
 */

export interface HealthSummary {
  /** Hours asleep in the last 24 hours */
  sleepHours?: number | undefined;
  steps?: number | undefined;
  activeEnergyKcal?: number | undefined;
  restingHeartRate?: number | undefined;
}

export interface HealthSummaryProvider {
  getSummary(): Promise<HealthSummary | null>;
}

export class InMemoryHealthSummaryProvider implements HealthSummaryProvider {
  constructor(private readonly summary: HealthSummary | null = null) {}

  async getSummary(): Promise<HealthSummary | null> {
    return this.summary === null ? null : { ...this.summary };
  }
}
