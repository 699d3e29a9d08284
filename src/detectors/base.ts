import { setTimeout as sleep } from 'node:timers/promises';
import type { Publisher } from '../bus/types.js';
import { Event, nowSeconds, type Clock, type EventPayload, type EventState, type EventValue } from '../events/event.js';
import { errMessage, log } from '../observability/log.js';

export type DetectorStatus = 'stopped' | 'starting' | 'running' | 'calibrating' | 'error' | 'disconnected';

export type DetectorState = {
  status: DetectorStatus;
  connected: boolean;
  lastEventTime: number | null;
  errorMessage: string | null;
  eventsEmitted: number;
  uptimeSeconds: number;
  extra: Record<string, EventValue>;
};

export type CalibrationResult = {
  success: boolean;
  message: string;
  baselineValues: Record<string, number>;
  recommendedSettings: Record<string, EventValue>;
  durationSeconds: number;
};

export interface Detector {
  readonly name: string;
  readonly status: DetectorStatus;
  start(): Promise<void>;
  stop(): Promise<void>;
  calibrate(): Promise<CalibrationResult>;
  getState(): DetectorState;
}

export type DetectorOptions = {
  publisher?: Publisher;
  sessionId?: string;
  clock?: Clock;
  onEvent?: (event: Event) => void | Promise<void>;
  onError?: (error: unknown) => void | Promise<void>;
};

/**
 * Lifecycle shared by every sensor front end. Subclasses supply the hardware
 * half (connect, disconnect, readLoop, calibrateImpl); this class numbers and
 * publishes what they emit.
 */
export abstract class BaseDetector implements Detector {
  private _status: DetectorStatus = 'stopped';
  private connected = false;
  private sequence = 0;
  private eventsEmitted = 0;
  private lastEventTime: number | null = null;
  private errorMessage: string | null = null;
  private startedAt: number | null = null;
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  protected readonly clock: Clock;
  protected running = false;
  publisher: Publisher | undefined;
  sessionId: string;
  onEvent: DetectorOptions['onEvent'];
  onError: DetectorOptions['onError'];

  constructor(readonly name: string, opts: DetectorOptions = {}) {
    this.publisher = opts.publisher;
    this.sessionId = opts.sessionId ?? '';
    this.clock = opts.clock ?? nowSeconds;
    this.onEvent = opts.onEvent;
    this.onError = opts.onError;
  }

  get status(): DetectorStatus { return this._status; }

  get isRunning(): boolean { return this.running && this._status === 'running'; }

  protected abstract connect(): Promise<void>;
  protected abstract disconnect(): Promise<void>;
  protected abstract readLoop(): Promise<void>;
  protected abstract calibrateImpl(): Promise<CalibrationResult>;
  protected abstract detectorSpecificState(): Record<string, EventValue>;

  async start(): Promise<void> {
    if (this.running) return;
    this._status = 'starting';
    this.errorMessage = null;
    try {
      await this.connect();
    } catch (e) {
      this._status = 'error';
      this.errorMessage = errMessage(e);
      this.connected = false;
      throw e;
    }
    this.connected = true;
    this.startedAt = this.clock();
    this.running = true;
    this.abort = new AbortController();
    this._status = 'running';
    this.loop = this.runReadLoop();
    log.info('detector.started', { detector: this.name });
  }

  async stop(): Promise<void> {
    this.running = false;
    this.abort?.abort();
    await this.loop;
    this.loop = null;
    try {
      await this.disconnect();
    } catch (e) {
      log.warn('detector.disconnect.failed', { detector: this.name, error: errMessage(e) });
    }
    this.connected = false;
    this._status = 'stopped';
  }

  async calibrate(): Promise<CalibrationResult> {
    const wasRunning = this.running;
    const prev = this._status;
    try {
      this._status = 'calibrating';
      if (!this.connected) {
        await this.connect();
        this.connected = true;
      }
      return await this.calibrateImpl();
    } finally {
      this._status = wasRunning ? prev : 'stopped';
    }
  }

  getState(): DetectorState {
    return {
      status: this._status,
      connected: this.connected,
      lastEventTime: this.lastEventTime,
      errorMessage: this.errorMessage,
      eventsEmitted: this.eventsEmitted,
      uptimeSeconds: this.startedAt === null ? 0 : this.clock() - this.startedAt,
      extra: this.detectorSpecificState(),
    };
  }

  protected async emitEvent(state: EventState, confidence: number, value: EventPayload): Promise<Event> {
    this.sequence += 1;
    const event = new Event({
      detector: this.name,
      timestamp: this.clock(),
      confidence,
      state,
      value,
      sequence: this.sequence,
      sessionId: this.sessionId,
    });
    if (this.publisher) await this.publisher.send(event);
    if (this.onEvent) await this.onEvent(event);
    this.lastEventTime = event.timestamp;
    this.eventsEmitted += 1;
    return event;
  }

  /** Resolves false when the detector was stopped during the wait. */
  protected async pause(ms: number): Promise<boolean> {
    const signal = this.abort?.signal;
    if (!signal || signal.aborted) return false;
    try {
      await sleep(ms, undefined, { signal });
      return true;
    } catch (e) {
      if (signal.aborted) return false;
      throw e;
    }
  }

  private async runReadLoop(): Promise<void> {
    try {
      await this.readLoop();
    } catch (e) {
      this._status = 'error';
      this.errorMessage = errMessage(e);
      log.error('detector.read_loop.failed', { detector: this.name, error: this.errorMessage });
      if (this.onError) {
        try {
          await this.onError(e);
        } catch (cbErr) {
          log.warn('detector.error_callback.failed', { detector: this.name, error: errMessage(cbErr) });
        }
      }
    }
  }
}
