import type { Alert } from '../events/alert.js';

/**
 * Delivery channel for alerts. `notify` and `test` report failure by
 * resolving false; callers still guard against a rejection.
 */
export interface Notifier {
  readonly name: string;
  readonly enabled: boolean;
  notify(alert: Alert): Promise<boolean>;
  test(): Promise<boolean>;
  start?(): Promise<void>;
  stop?(): Promise<void>;
}
