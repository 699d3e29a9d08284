import type { EventState, EventValue } from '../events/event.js';
import { BaseDetector, type CalibrationResult, type DetectorOptions } from './base.js';

export const ANOMALIES = ['apnea', 'bradycardia', 'seizure'] as const;
export type Anomaly = (typeof ANOMALIES)[number];

export type MockDetectorOptions = DetectorOptions & {
  updateRateHz?: number;
  baseRespirationRate?: number;
  baseHeartRate?: number;
  noiseLevel?: number;
  random?: () => number;
};

const round = (x: number, digits: number) => {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
};

/** Synthetic vital-signs source for running the pipeline without hardware. */
export class MockDetector extends BaseDetector {
  readonly updateRateHz: number;
  readonly baseRespirationRate: number;
  readonly baseHeartRate: number;
  readonly noiseLevel: number;
  private readonly random: () => number;
  private anomaly: { kind: Anomaly; startedAt: number; durationSeconds: number } | null = null;

  constructor(name = 'mock', opts: MockDetectorOptions = {}) {
    super(name, opts);
    this.updateRateHz = opts.updateRateHz ?? 10;
    this.baseRespirationRate = opts.baseRespirationRate ?? 14;
    this.baseHeartRate = opts.baseHeartRate ?? 70;
    this.noiseLevel = opts.noiseLevel ?? 0.1;
    this.random = opts.random ?? Math.random;
  }

  protected async connect(): Promise<void> {}

  protected async disconnect(): Promise<void> {}

  protected async readLoop(): Promise<void> {
    const intervalMs = 1000 / this.updateRateHz;
    while (this.running) {
      await this.sample();
      if (!(await this.pause(intervalMs))) break;
    }
  }

  // Box-Muller
  private gauss(sigma: number): number {
    const u = 1 - this.random();
    const v = this.random();
    return sigma * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }

  get activeAnomaly(): Anomaly | null {
    if (this.anomaly && this.clock() - this.anomaly.startedAt >= this.anomaly.durationSeconds) this.anomaly = null;
    return this.anomaly?.kind ?? null;
  }

  /** Emits one reading. */
  async sample(): Promise<void> {
    let respirationRate = this.baseRespirationRate + this.gauss(this.noiseLevel * 2);
    let heartRate = this.baseHeartRate + this.gauss(this.noiseLevel * 5);
    let movement = this.random() * 0.3;

    switch (this.activeAnomaly) {
      case 'apnea': respirationRate = Math.max(0, respirationRate * 0.2); break;
      case 'bradycardia': heartRate = Math.max(30, heartRate * 0.5); break;
      case 'seizure': movement = Math.min(1, movement + 0.7); break;
      case null: break;
    }

    let state: EventState = 'normal';
    if (respirationRate < 8) state = 'warning';
    if (respirationRate < 5) state = 'alert';

    await this.emitEvent(state, 0.9, {
      respiration_rate: round(respirationRate, 1),
      heart_rate: round(heartRate, 1),
      movement: round(movement, 2),
      presence: true,
    });
  }

  injectAnomaly(kind: Anomaly, durationSeconds: number): void {
    this.anomaly = { kind, startedAt: this.clock(), durationSeconds };
  }

  protected async calibrateImpl(): Promise<CalibrationResult> {
    return {
      success: true,
      message: 'Mock calibration complete',
      baselineValues: { respiration_rate: this.baseRespirationRate, heart_rate: this.baseHeartRate },
      recommendedSettings: {},
      durationSeconds: 0,
    };
  }

  protected detectorSpecificState(): Record<string, EventValue> {
    return {
      update_rate_hz: this.updateRateHz,
      base_respiration_rate: this.baseRespirationRate,
      base_heart_rate: this.baseHeartRate,
      active_anomaly: this.activeAnomaly,
    };
  }
}
