/**
 * Time Range Tests
 */

import { describe, it, expect } from 'vitest';
import { addDays, parseTimeRange } from '../../src/workflows/time-range.js';

describe('parseTimeRange', () => {
  it('should_resolveMorningRange_when_wellFormed', () => {
    expect(parseTimeRange('9:00 AM - 11:00 AM', '2025-03-10')).toEqual({
      start: '2025-03-10T09:00:00',
      end: '2025-03-10T11:00:00',
    });
  });

  it('should_convertAfternoonHours_when_pm', () => {
    expect(parseTimeRange('2:00 PM - 4:30 PM', '2025-03-11')).toEqual({
      start: '2025-03-11T14:00:00',
      end: '2025-03-11T16:30:00',
    });
  });

  it('should_acceptLowercaseAndTightSpacing_when_parsing', () => {
    expect(parseTimeRange('9:15am-10:45am', '2025-03-10')).toEqual({
      start: '2025-03-10T09:15:00',
      end: '2025-03-10T10:45:00',
    });
  });

  it('should_treatTwelveAmAsMidnight_when_parsing', () => {
    expect(parseTimeRange('12:00 AM - 12:30 PM', '2025-03-10')).toEqual({
      start: '2025-03-10T00:00:00',
      end: '2025-03-10T12:30:00',
    });
  });

  it('should_endOneHourLater_when_endBeforeStart', () => {
    expect(parseTimeRange('2:00 PM - 1:00 PM', '2025-03-10')).toEqual({
      start: '2025-03-10T14:00:00',
      end: '2025-03-10T15:00:00',
    });
  });

  it('should_endOneHourLater_when_endEqualsStart', () => {
    expect(parseTimeRange('6:00 PM - 6:00 PM', '2025-03-10').end).toBe('2025-03-10T19:00:00');
  });

  it('should_rollIntoNextDay_when_extendedPastMidnight', () => {
    expect(parseTimeRange('11:30 PM - 12:15 AM', '2025-03-10')).toEqual({
      start: '2025-03-10T23:30:00',
      end: '2025-03-11T00:30:00',
    });
  });

  it('should_defaultToNineToTen_when_unreadable', () => {
    const fallback = { start: '2025-03-10T09:00:00', end: '2025-03-10T10:00:00' };

    expect(parseTimeRange('Morning', '2025-03-10')).toEqual(fallback);
    expect(parseTimeRange(undefined, '2025-03-10')).toEqual(fallback);
    expect(parseTimeRange('', '2025-03-10')).toEqual(fallback);
  });

  it('should_defaultToNineToTen_when_clockOutOfRange', () => {
    expect(parseTimeRange('13:00 PM - 2:00 PM', '2025-03-10').start).toBe('2025-03-10T09:00:00');
    expect(parseTimeRange('9:75 AM - 10:00 AM', '2025-03-10').start).toBe('2025-03-10T09:00:00');
    expect(parseTimeRange('0:30 AM - 1:00 AM', '2025-03-10').start).toBe('2025-03-10T09:00:00');
  });

  it('should_useDatePart_when_dayHasTime', () => {
    expect(parseTimeRange('9:00 AM - 10:00 AM', '2025-03-10T08:00:00Z').start).toBe('2025-03-10T09:00:00');
  });
});

describe('addDays', () => {
  it('should_crossMonthAndLeapDay_when_adding', () => {
    expect(addDays('2025-02-28', 1)).toBe('2025-03-01');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
    expect(addDays('2025-03-10', 0)).toBe('2025-03-10');
  });

  it('should_returnInput_when_notADate', () => {
    expect(addDays('someday', 2)).toBe('someday');
  });
});
