import {
  durationInHours,
  formatUtc,
  isWithinWindow,
  rangesOverlap,
  TimeRange,
} from './time-range';

const at = (hhmm: string) => new Date(`2099-03-01T${hhmm}:00Z`);
const range = (start: string, end: string): TimeRange => ({
  start: at(start),
  end: at(end),
});

describe('rangesOverlap', () => {
  const booked = range('10:00', '12:00');

  it.each([
    ['partial overlap at the start', range('09:00', '11:00')],
    ['partial overlap at the end', range('11:00', '13:00')],
    ['containment', range('10:30', '11:30')],
    ['enclosing range', range('09:00', '13:00')],
    ['identical range', range('10:00', '12:00')],
  ])('detects %s', (_label, candidate) => {
    expect(rangesOverlap(candidate, booked)).toBe(true);
    expect(rangesOverlap(booked, candidate)).toBe(true);
  });

  it('treats back-to-back ranges as free', () => {
    expect(rangesOverlap(range('12:00', '13:00'), booked)).toBe(false);
    expect(rangesOverlap(range('08:00', '10:00'), booked)).toBe(false);
  });
});

describe('isWithinWindow', () => {
  it('accepts any range when the window is open on both sides', () => {
    expect(isWithinWindow(range('01:00', '23:00'), null, null)).toBe(true);
  });

  it('rejects ranges that start before or end after the window', () => {
    expect(isWithinWindow(range('07:00', '09:00'), at('08:00'), null)).toBe(false);
    expect(isWithinWindow(range('17:00', '19:00'), null, at('18:00'))).toBe(false);
    expect(isWithinWindow(range('08:00', '18:00'), at('08:00'), at('18:00'))).toBe(
      true,
    );
  });
});

describe('durationInHours / formatUtc', () => {
  it('measures fractional hours', () => {
    expect(durationInHours(range('10:00', '11:30'))).toBe(1.5);
  });

  it('formats to the minute in UTC', () => {
    expect(formatUtc(at('09:05'))).toBe('2099-03-01 09:05 UTC');
  });
});
