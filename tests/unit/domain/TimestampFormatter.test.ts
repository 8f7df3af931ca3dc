import { describe, it, expect } from 'vitest';
import { formatTimestamp } from '../../../src/domain/services/TimestampFormatter.js';

describe('formatTimestamp', () => {
  const instant = new Date('2024-01-01T13:45:02Z');

  it('should render a date and time pattern', () => {
    expect(formatTimestamp(instant, '%Y-%m-%d %H:%M:%S')).toBe('2024-01-01 13:45:02');
  });

  it('should render month names', () => {
    expect(formatTimestamp(instant, '%d/%b/%Y:%H:%M:%S')).toBe('01/Jan/2024:13:45:02');
  });

  it('should render in UTC', () => {
    expect(formatTimestamp(new Date('2024-06-30T23:30:00Z'), '%Y-%m-%d %H')).toBe('2024-06-30 23');
  });
});
