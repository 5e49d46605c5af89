import { MS_IN_MINUTE } from '../shared/time-math';
import { TimeAxis } from './time-axis';

describe('TimeAxis', () => {
  const now = new Date('2026-10-18T05:50:00-04:00');
  const axis = new TimeAxis(now);

  it('starts the window at the previous half hour and spans three hours', () => {
    expect(axis.windowStart.toISOString()).toBe('2026-10-18T09:30:00.000Z');
    expect(axis.windowEnd.toISOString()).toBe('2026-10-18T12:30:00.000Z');
    expect(axis.windowMs).toBe(3 * 60 * MS_IN_MINUTE);
  });

  it('maps the window edges onto the drawable band', () => {
    expect(axis.toX(axis.windowStart)).toBe(50);
    expect(axis.toX(axis.windowEnd)).toBe(760);
    expect(axis.drawableWidth).toBe(710);
  });

  it('places now inside the band', () => {
    const x = axis.toX(now);

    expect(Math.round(x)).toBe(129);
    expect(axis.contains(now)).toBe(true);
  });

  it('is strictly increasing in time', () => {
    const base = axis.windowStart.getTime();
    let previous = Number.NEGATIVE_INFINITY;
    for (let minute = -30; minute <= 210; minute += 7) {
      const x = axis.toX(base + minute * MS_IN_MINUTE);
      expect(x).toBeGreaterThan(previous);
      previous = x;
    }
  });

  it('maps times outside the window outside the band', () => {
    expect(axis.toX(Date.parse('2026-10-18T05:00:00-04:00'))).toBeLessThan(50);
    expect(axis.toX(Date.parse('2026-10-18T09:00:00-04:00'))).toBeGreaterThan(760);
    expect(axis.contains(Date.parse('2026-10-18T09:00:00-04:00'))).toBe(false);
  });

  it('inverts toX', () => {
    const time = Date.parse('2026-10-18T07:13:00-04:00');

    expect(Math.abs(axis.toTime(axis.toX(time)).getTime() - time)).toBeLessThanOrEqual(1);
  });

  it('ticks every half hour including both ends', () => {
    const ticks = axis.ticks();

    expect(ticks).toHaveLength(7);
    expect(ticks.map((tick) => Math.round(tick.x))).toEqual([50, 168, 287, 405, 523, 642, 760]);
  });

  it('rejects margins that leave no room', () => {
    expect(() => new TimeAxis(now, { leftMargin: 400, rightMargin: 400 })).toThrow(RangeError);
    expect(() => new TimeAxis(now, { windowHours: 0 })).toThrow(RangeError);
  });
});
