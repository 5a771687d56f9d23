/**
 * Event Timing Tests
 *
 * Timestamp parsing, duration computation and the both-or-neither policy.
 */

import {
  parseEventTime,
  parseEventDate,
  computeDurationHours,
  normalizeEvent,
  normalizeEvents,
  type EventClock,
  type EventDay,
} from '@sof-extract/shared';
import { makeEvent } from './helpers';

describe('parseEventTime', () => {
  it.each<[string, EventClock]>([
    ['08:00', { hours: 8, minutes: 0, seconds: 0 }],
    ['0800', { hours: 8, minutes: 0, seconds: 0 }],
    ['8.30', { hours: 8, minutes: 30, seconds: 0 }],
    ['14:00 hrs', { hours: 14, minutes: 0, seconds: 0 }],
    ['2:15 pm', { hours: 14, minutes: 15, seconds: 0 }],
    ['12:05 am', { hours: 0, minutes: 5, seconds: 0 }],
    ['06:45:30', { hours: 6, minutes: 45, seconds: 30 }],
    ['24:00', { hours: 24, minutes: 0, seconds: 0 }],
  ])('parses %s', (raw, expected) => {
    expect(parseEventTime(raw)).toEqual(expected);
  });

  it.each(['25:00', '10:75', '24:30', '13:00 pm', 'noon', ''])('rejects %p', (raw) => {
    expect(parseEventTime(raw)).toBeNull();
  });
});

describe('parseEventDate', () => {
  it.each<[string, EventDay]>([
    ['2024-03-14', { year: 2024, month: 2, day: 14 }],
    ['14/03/2024', { year: 2024, month: 2, day: 14 }],
    ['14.03.24', { year: 2024, month: 2, day: 14 }],
    ['14 Mar', { year: null, month: 2, day: 14 }],
    ['14th March 2024', { year: 2024, month: 2, day: 14 }],
    ['Mar 14, 2024', { year: 2024, month: 2, day: 14 }],
    ['Thursday 14th March 2024', { year: 2024, month: 2, day: 14 }],
    ['29 Feb', { year: null, month: 1, day: 29 }],
  ])('parses %s', (raw, expected) => {
    expect(parseEventDate(raw)).toEqual(expected);
  });

  it.each(['31/02/2024', '14 Foo 2024', 'next week', '2024-13-01'])('rejects %p', (raw) => {
    expect(parseEventDate(raw)).toBeNull();
  });
});

describe('computeDurationHours', () => {
  it('computes hours between same-day timestamps', () => {
    expect(computeDurationHours(makeEvent())).toBe(6);
  });

  it('computes durations without dates', () => {
    expect(
      computeDurationHours(
        makeEvent({ start_date: null, end_date: null, start_time: '08:00', end_time: '09:30' })
      )
    ).toBe(1.5);
  });

  it('rolls an earlier end time past midnight when no end date is given', () => {
    expect(
      computeDurationHours(
        makeEvent({ start_date: '14 Mar', start_time: '22:00', end_date: null, end_time: '02:00' })
      )
    ).toBe(4);
  });

  it('uses explicit end dates across days', () => {
    expect(
      computeDurationHours(
        makeEvent({ start_date: '14 Mar', start_time: '22:00', end_date: '15 Mar', end_time: '02:30' })
      )
    ).toBe(4.5);
  });

  it('crosses New Year for year-less dates', () => {
    expect(
      computeDurationHours(
        makeEvent({ start_date: '31 Dec', start_time: '22:00', end_date: '1 Jan', end_time: '02:00' })
      )
    ).toBe(4);
  });

  it('rounds to two decimals', () => {
    expect(
      computeDurationHours(makeEvent({ start_time: '08:00', end_time: '08:20' }))
    ).toBe(0.33);
  });

  it('returns null when the end precedes the start on explicit dates', () => {
    expect(
      computeDurationHours(
        makeEvent({ start_date: '15 Mar', start_time: '10:00', end_date: '14 Mar', end_time: '09:00' })
      )
    ).toBeNull();
  });

  it('returns null for unreadable timestamps', () => {
    expect(computeDurationHours(makeEvent({ start_time: 'morning' }))).toBeNull();
    expect(computeDurationHours(makeEvent({ start_date: 'sometime' }))).toBeNull();
  });

  it('returns null when a timestamp is missing', () => {
    expect(computeDurationHours(makeEvent({ end_time: null }))).toBeNull();
  });
});

describe('normalizeEvent', () => {
  it('makes a start-only event instantaneous', () => {
    const event = makeEvent({
      event_type: 'NOR tendered',
      start_date: '15 Mar',
      start_time: '09:30',
      end_date: null,
      end_time: null,
    });

    const normalized = normalizeEvent(event);

    expect(normalized.end_date).toBe('15 Mar');
    expect(normalized.end_time).toBe('09:30');
    expect(normalized.duration_hours).toBeNull();
  });

  it('makes an end-only event instantaneous', () => {
    const event = makeEvent({
      start_date: null,
      start_time: null,
      end_date: '15 Mar',
      end_time: '11:00',
    });

    const normalized = normalizeEvent(event);

    expect(normalized.start_date).toBe('15 Mar');
    expect(normalized.start_time).toBe('11:00');
  });

  it('gives a start-only event the start date instead of a later end date', () => {
    const normalized = normalizeEvent(
      makeEvent({
        start_date: '14 Mar',
        start_time: '08:00',
        end_date: '15 Mar',
        end_time: null,
        duration_hours: null,
      })
    );

    expect(normalized).toMatchObject({
      start_date: '14 Mar',
      start_time: '08:00',
      end_date: '14 Mar',
      end_time: '08:00',
      duration_hours: null,
    });
  });

  it('gives an end-only event the end date instead of an earlier start date', () => {
    const normalized = normalizeEvent(
      makeEvent({
        start_date: '14 Mar',
        start_time: null,
        end_date: '15 Mar',
        end_time: '11:00',
        duration_hours: null,
      })
    );

    expect(normalized).toMatchObject({
      start_date: '15 Mar',
      start_time: '11:00',
      end_date: '15 Mar',
      end_time: '11:00',
      duration_hours: null,
    });
  });

  it('borrows the only date given when the timestamp side has none', () => {
    const normalized = normalizeEvent(
      makeEvent({ start_date: null, start_time: '08:00', end_date: '15 Mar', end_time: null })
    );

    expect(normalized.start_date).toBe('15 Mar');
    expect(normalized.end_date).toBe('15 Mar');
    expect(normalized.duration_hours).toBeNull();
  });

  it('treats blank strings as absent', () => {
    const normalized = normalizeEvent(makeEvent({ start_time: '10:00', end_time: '  ' }));
    expect(normalized.end_time).toBe('10:00');
  });

  it('leaves an event without timestamps untouched', () => {
    const event = makeEvent({
      start_date: null,
      start_time: null,
      end_date: null,
      end_time: null,
      duration_hours: null,
    });

    expect(normalizeEvent(event)).toEqual(event);
  });

  it('replaces the reported duration with the computed one', () => {
    expect(normalizeEvent(makeEvent({ duration_hours: 5 })).duration_hours).toBe(6);
  });

  it('keeps the reported duration when timestamps cannot be read', () => {
    const event = makeEvent({ start_time: 'morning', end_time: 'evening', duration_hours: 3 });
    expect(normalizeEvent(event).duration_hours).toBe(3);
  });

  it('does not mutate its input', () => {
    const event = makeEvent({ end_time: null });
    normalizeEvent(event);
    expect(event.end_time).toBeNull();
  });
});

describe('normalizeEvents', () => {
  it('keeps document order', () => {
    const events = normalizeEvents([
      makeEvent({ event_id: 2, event_type: 'Loading completed' }),
      makeEvent({ event_id: 1, event_type: 'Loading commenced' }),
    ]);

    expect(events.map((e) => e.event_id)).toEqual([2, 1]);
  });
});
