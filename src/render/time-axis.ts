import { MS_IN_MINUTE, addHours, differenceInMs, floorToStep } from '../shared/time-math';

export interface TimeAxisOptions {
  canvasWidth: number;
  leftMargin: number;
  rightMargin: number;
  windowHours: number;
  /** Alignment of the window start; `now` is floored to this step. */
  alignMs: number;
}

export interface AxisTick {
  time: Date;
  x: number;
}

export const DEFAULT_AXIS_OPTIONS: TimeAxisOptions = {
  canvasWidth: 800,
  leftMargin: 50,
  rightMargin: 40,
  windowHours: 3,
  alignMs: 30 * MS_IN_MINUTE,
};

/**
 * Affine mapping between wall-clock time and canvas columns for one render.
 * Times outside the window map outside the drawable band; nothing is clamped here.
 */
export class TimeAxis {
  readonly windowStart: Date;
  readonly windowEnd: Date;
  private readonly options: TimeAxisOptions;

  constructor(now: Date, options: Partial<TimeAxisOptions> = {}) {
    this.options = { ...DEFAULT_AXIS_OPTIONS, ...options };
    if (this.options.windowHours <= 0) {
      throw new RangeError('Time axis window must be positive.');
    }
    if (this.drawableWidth <= 0) {
      throw new RangeError('Time axis margins leave no drawable width.');
    }
    this.windowStart = floorToStep(now, this.options.alignMs);
    this.windowEnd = addHours(this.windowStart, this.options.windowHours);
    Object.freeze(this);
  }

  get drawableLeft(): number {
    return this.options.leftMargin;
  }

  get drawableRight(): number {
    return this.options.canvasWidth - this.options.rightMargin;
  }

  get drawableWidth(): number {
    return this.drawableRight - this.drawableLeft;
  }

  get windowMs(): number {
    return differenceInMs(this.windowEnd, this.windowStart);
  }

  toX(time: Date | number): number {
    const timeValue = typeof time === 'number' ? time : time.getTime();
    const ratio = (timeValue - this.windowStart.getTime()) / this.windowMs;
    return this.drawableLeft + ratio * this.drawableWidth;
  }

  toTime(x: number): Date {
    const ratio = (x - this.drawableLeft) / this.drawableWidth;
    return new Date(this.windowStart.getTime() + ratio * this.windowMs);
  }

  contains(time: Date | number): boolean {
    const timeValue = typeof time === 'number' ? time : time.getTime();
    return timeValue >= this.windowStart.getTime() && timeValue <= this.windowEnd.getTime();
  }

  /** Ticks every `stepMs` from the window start through the window end, inclusive. */
  ticks(stepMs: number = this.options.alignMs): AxisTick[] {
    const ticks: AxisTick[] = [];
    for (let ts = this.windowStart.getTime(); ts <= this.windowEnd.getTime(); ts += stepMs) {
      ticks.push({ time: new Date(ts), x: this.toX(ts) });
    }
    return ticks;
  }
}
