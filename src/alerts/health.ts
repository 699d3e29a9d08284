import { nowSeconds, type Clock } from '../events/event.js';

export type DetectorStatus = 'unknown' | 'online' | 'offline';

// Liveness from the time of each detector's last event.
export class DetectorHealthMonitor {
  private readonly lastSeen = new Map<string, number>();
  private readonly reported = new Set<string>();

  constructor(readonly timeoutSeconds = 10, private readonly clock: Clock = nowSeconds) {}

  update(detector: string, at = this.clock()): void {
    this.lastSeen.set(detector, at);
    this.reported.delete(detector);
  }

  getStatus(detector: string): DetectorStatus {
    const seen = this.lastSeen.get(detector);
    if (seen === undefined) return 'unknown';
    return this.clock() - seen > this.timeoutSeconds ? 'offline' : 'online';
  }

  getOfflineDetectors(): string[] {
    return [...this.lastSeen.keys()].filter(d => this.getStatus(d) === 'offline');
  }

  getAllStatus(): Record<string, DetectorStatus> {
    const out: Record<string, DetectorStatus> = {};
    for (const d of this.lastSeen.keys()) out[d] = this.getStatus(d);
    return out;
  }

  /** Offline detectors not yet reported since their last event. */
  checkNewlyOffline(): string[] {
    const fresh = this.getOfflineDetectors().filter(d => !this.reported.has(d));
    for (const d of fresh) this.reported.add(d);
    return fresh;
  }
}
