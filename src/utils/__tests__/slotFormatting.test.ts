import { createSlotFormatter } from '../slotFormatting';

describe('slot formatting', () => {
  it('renders a start time in the display zone', () => {
    const formatter = createSlotFormatter('UTC');
    expect(formatter.formatStart(new Date('2026-03-02T10:00:00.000Z'))).toBe(
      'Monday, March 02, 2026 at 10:00 AM',
    );
  });

  it('appends the duration to slot labels', () => {
    const formatter = createSlotFormatter('UTC');
    expect(
      formatter.formatSlot({ startsAt: new Date('2026-03-03T14:30:00.000Z'), durationMinutes: 45 }),
    ).toBe('Tuesday, March 03, 2026 at 02:30 PM (45 min)');
  });

  it('converts to a named zone', () => {
    const formatter = createSlotFormatter('America/New_York');
    expect(formatter.timeZone).toBe('America/New_York');
    expect(formatter.formatStart(new Date('2026-03-02T15:00:00.000Z'))).toBe(
      'Monday, March 02, 2026 at 10:00 AM',
    );
  });

  it('rejects an unknown zone', () => {
    expect(() => createSlotFormatter('Not/AZone')).toThrow(RangeError);
  });
});
