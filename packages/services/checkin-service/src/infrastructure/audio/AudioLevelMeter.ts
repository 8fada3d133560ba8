import { errorMessage } from '@moodlens/platform-core';
import { getLogger } from '../../config/service-config';

const logger = getLogger('audio-level-meter');

export interface LevelSource {
  /** Average power in dBFS, -160 (silence) to 0 */
  averagePower(): number;
}

export interface AudioLevelMeterOptions {
  intervalMs?: number;
  maxDurationMs?: number;
  onLevel?: (level: number, elapsedMs: number) => void;
  onAutoStop?: () => void;
}

export function powerToLevel(decibels: number): number {
  if (Number.isNaN(decibels)) return 0;
  return Math.min(1, Math.max(0, 10 ** (decibels / 20)));
}

/**
 * Samples a level source while recording. Stops itself at maxDurationMs;
 * stop() cancels the timer immediately.
 */
export class AudioLevelMeter {
  private readonly intervalMs: number;
  private readonly maxDurationMs: number;
  private readonly onLevel?: (level: number, elapsedMs: number) => void;
  private readonly onAutoStop?: () => void;

  private timer: ReturnType<typeof setInterval> | null = null;
  private _level = 0;
  private _elapsedMs = 0;

  constructor(
    private readonly source: LevelSource,
    options: AudioLevelMeterOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 50;
    this.maxDurationMs = options.maxDurationMs ?? 10000;
    this.onLevel = options.onLevel;
    this.onAutoStop = options.onAutoStop;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get level(): number {
    return this._level;
  }

  get elapsedMs(): number {
    return this._elapsedMs;
  }

  start(): void {
    if (this.timer) return;
    this._level = 0;
    this._elapsedMs = 0;
    this.timer = setInterval(() => this.sample(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  private sample(): void {
    this._elapsedMs += this.intervalMs;

    try {
      this._level = powerToLevel(this.source.averagePower());
    } catch (error) {
      logger.warn('Level source failed, stopping meter', { error: errorMessage(error) });
      this.stop();
      return;
    }

    this.onLevel?.(this._level, this._elapsedMs);

    if (this._elapsedMs >= this.maxDurationMs) {
      this.stop();
      logger.debug('Recording reached maximum duration', { maxDurationMs: this.maxDurationMs });
      this.onAutoStop?.();
    }
  }
}
