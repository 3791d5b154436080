import { formatDuration, parseDuration } from './duration';

describe('parseDuration', () => {
  it('parses single-unit durations', () => {
    expect(parseDuration('5s')).toBe(5000);
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('2m')).toBe(120000);
    expect(parseDuration('1h')).toBe(3600000);
  });

  it('parses compound and fractional durations', () => {
    expect(parseDuration('1m30s')).toBe(90000);
    expect(parseDuration('1h30m')).toBe(5400000);
    expect(parseDuration('1.5s')).toBe(1500);
    expect(parseDuration('.5m')).toBe(30000);
  });

  it('parses sub-millisecond units', () => {
    expect(parseDuration('1500us')).toBe(1.5);
    expect(parseDuration('2000000ns')).toBe(2);
  });

  it('accepts a bare zero and an explicit sign', () => {
    expect(parseDuration('0')).toBe(0);
    expect(parseDuration('-2s')).toBe(-2000);
    expect(parseDuration('+2s')).toBe(2000);
  });

  it.each(['', '5', 's', '5 s', '5x', '1m30', 'ten seconds', '-'])('rejects %p', input => {
    expect(() => parseDuration(input)).toThrow('invalid duration');
  });
});

describe('formatDuration', () => {
  it('renders whole seconds and minutes', () => {
    expect(formatDuration(5000)).toBe('5s');
    expect(formatDuration(60000)).toBe('1m0s');
    expect(formatDuration(90000)).toBe('1m30s');
  });

  it('always carries minutes and seconds once hours appear', () => {
    expect(formatDuration(3600000)).toBe('1h0m0s');
    expect(formatDuration(5400000)).toBe('1h30m0s');
  });

  it('renders fractions without trailing zeros', () => {
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1.5)).toBe('1.5ms');
    expect(formatDuration(0.25)).toBe('250µs');
  });

  it('renders zero as 0s', () => {
    expect(formatDuration(0)).toBe('0s');
  });
});
