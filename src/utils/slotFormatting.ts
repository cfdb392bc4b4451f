import type { TimeSlotRecord } from '../types/scheduling';

export type SlotFormatter = {
  timeZone: string;
  /** e.g. "Monday, March 02, 2026 at 10:00 AM" */
  formatStart(startsAt: Date): string;
  /** e.g. "Monday, March 02, 2026 at 10:00 AM (60 min)" */
  formatSlot(slot: Pick<TimeSlotRecord, 'startsAt' | 'durationMinutes'>): string;
};

type PartType = Intl.DateTimeFormatPartTypes;

export function createSlotFormatter(timeZone: string): SlotFormatter {
  // Throws RangeError for an unknown zone, which should fail startup rather than a request.
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'long',
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
  });

  const formatStart = (startsAt: Date): string => {
    const parts = new Map<PartType, string>();
    formatter.formatToParts(startsAt).forEach((part) => parts.set(part.type, part.value));
    const part = (type: PartType) => parts.get(type) ?? '';

    return (
      `${part('weekday')}, ${part('month')} ${part('day')}, ${part('year')} ` +
      `at ${part('hour')}:${part('minute')} ${part('dayPeriod').toUpperCase()}`
    );
  };

  return {
    timeZone,
    formatStart,
    formatSlot: (slot) => `${formatStart(slot.startsAt)} (${slot.durationMinutes} min)`,
  };
}
