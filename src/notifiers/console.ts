import type { Alert } from '../events/alert.js';
import { log } from '../observability/log.js';
import type { Notifier } from './types.js';

// Writes each alert as a log line; the default channel when nothing else is configured.
export class ConsoleNotifier implements Notifier {
  readonly name = 'console';

  constructor(readonly enabled = true) {}

  async notify(alert: Alert): Promise<boolean> {
    if (!this.enabled) return false;
    log.warn('notify.console', {
      id: alert.id,
      severity: alert.severity,
      rule: alert.ruleName,
      message: alert.message,
      created_at: alert.createdAt,
    });
    return true;
  }

  async test(): Promise<boolean> {
    log.info('notify.console.test');
    return this.enabled;
  }
}
