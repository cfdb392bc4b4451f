import {
  addContact,
  buildHarness,
  expectOk,
  registerOrganizer,
} from '../../__tests__/helpers/harness';
import { MAX_SLOTS_PER_MEETING } from '../domain/meetings/MeetingDomainService';
import { StorageTimeoutError } from '../repositories/common/errors';

const BASE = new Date('2026-03-02T09:00:00.000Z').getTime();
const HOUR_MS = 60 * 60 * 1000;

function slots(count: number) {
  return Array.from({ length: count }, (_, index) => ({ startsAt: new Date(BASE + index * HOUR_MS) }));
}

async function setup() {
  const harness = buildHarness();
  const ctx = await registerOrganizer(harness.services, 'olive@example.test', 'Olive');
  const ann = await addContact(harness.services, ctx, 'Ann', 'ann@example.test');
  const bob = await addContact(harness.services, ctx, 'Bob', 'bob@example.test');
  return { ...harness, ctx, ann, bob };
}

describe('MeetingDomainService', () => {
  it('validates the title, slots and participants', async () => {
    const { services, ctx, ann } = await setup();
    const create = (overrides: Partial<Parameters<typeof services.meetingService.createMeeting>[1]>) =>
      services.meetingService.createMeeting(ctx, {
        title: 'Sync',
        slots: slots(1),
        participants: { contactIds: [ann] },
        ...overrides,
      });

    const reasons = await Promise.all([
      create({ title: '  <b></b> ' }),
      create({ slots: [] }),
      create({ slots: [{ startsAt: new Date('not a date') }] }),
      create({ slots: [{ startsAt: new Date(BASE), durationMinutes: 0 }] }),
      create({ slots: [{ startsAt: new Date(BASE), durationMinutes: 1441 }] }),
      create({ participants: {} }),
    ]);
    expect(reasons.map((result) => (result.ok ? null : result.error.reason))).toEqual([
      'invalid_input',
      'invalid_input',
      'invalid_input',
      'invalid_input',
      'invalid_input',
      'invalid_input',
    ]);

    const tooMany = await create({ slots: slots(MAX_SLOTS_PER_MEETING + 1) });
    expect(tooMany).toEqual({
      ok: false,
      error: {
        kind: 'validation_failed',
        reason: 'too_many_slots',
        message: 'A meeting can have at most 10 time slots.',
        details: { maxSlots: 10 },
      },
    });

    const missing = await create({ participants: { contactIds: [ann, 'contact-404'] } });
    expect(missing.ok ? null : missing.error.details).toEqual({ contactIds: ['contact-404'] });
    expect(await services.meetingService.listMeetings(ctx)).toEqual([]);
  });

  it('deduplicates participants selected directly and through a group', async () => {
    const { services, ctx, ann, bob } = await setup();
    const group = expectOk(await services.groupService.createGroup(ctx, { name: 'Core' }));
    expectOk(await services.groupService.addMember(ctx, group.id, ann));
    expectOk(await services.groupService.addMember(ctx, group.id, bob));

    const detail = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'Sync',
        slots: slots(1),
        participants: { contactIds: [ann], groupIds: [group.id] },
      }),
    );
    expect(detail.participants.map((participant) => participant.contactId).sort()).toEqual(
      [ann, bob].sort(),
    );
  });

  it('caps slots added later and announces changes on sent meetings', async () => {
    const { services, ctx, ann, notifications } = await setup();
    const detail = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'Sync',
        slots: slots(MAX_SLOTS_PER_MEETING - 1),
        participants: { contactIds: [ann] },
      }),
    );
    const meetingId = detail.meeting.id;

    const draftAdd = expectOk(
      await services.meetingService.addSlot(ctx, meetingId, { startsAt: new Date(BASE - HOUR_MS) }),
    );
    expect(draftAdd.deliveries).toBeNull();
    expect(draftAdd.slots[0].id).toBe(draftAdd.slot.id);
    expect(draftAdd.slots).toHaveLength(MAX_SLOTS_PER_MEETING);

    const overLimit = await services.meetingService.addSlot(ctx, meetingId, { startsAt: new Date(BASE) });
    expect(overLimit.ok ? null : overLimit.error.reason).toBe('too_many_slots');

    expectOk(await services.meetingService.sendInvitations(ctx, meetingId));
    notifications.clear();
    const removed = expectOk(await services.meetingService.deleteSlot(ctx, meetingId, draftAdd.slot.id));
    expect(removed.deliveries).toEqual({ attempted: 1, delivered: 0, simulated: 1, failed: 0, failures: [] });
    expect(notifications.recipients('schedule-update')).toEqual(['ann@example.test']);
    expect(notifications.sent['schedule-update'][0].payload.slots).toHaveLength(MAX_SLOTS_PER_MEETING - 1);
  });

  it('rejects a slot id from another meeting', async () => {
    const { services, ctx, ann } = await setup();
    const first = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'First',
        slots: slots(2),
        participants: { contactIds: [ann] },
      }),
    );
    const second = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'Second',
        slots: slots(2),
        participants: { contactIds: [ann] },
      }),
    );

    const result = await services.meetingService.deleteSlot(ctx, first.meeting.id, second.slots[0].id);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'not_found',
        reason: 'unknown_slot',
        message: 'This slot does not belong to the meeting.',
      },
    });
  });

  it('invites participants added after sending and skips existing ones', async () => {
    const { services, ctx, ann, bob, notifications } = await setup();
    const detail = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'Sync',
        slots: slots(1),
        participants: { contactIds: [ann] },
      }),
    );
    expectOk(await services.meetingService.sendInvitations(ctx, detail.meeting.id));
    notifications.clear();

    const added = expectOk(
      await services.meetingService.addParticipants(ctx, detail.meeting.id, { contactIds: [ann, bob] }),
    );
    expect(added.added).toEqual([bob]);
    expect(added.existing).toEqual([ann]);
    expect(notifications.recipients('invitation')).toEqual(['bob@example.test']);
  });

  it('lists meetings newest first', async () => {
    const { services, ctx, ann, clock } = await setup();
    const request = { slots: slots(1), participants: { contactIds: [ann] } };
    const older = expectOk(await services.meetingService.createMeeting(ctx, { ...request, title: 'Older' }));
    clock.advance(60_000);
    const newer = expectOk(await services.meetingService.createMeeting(ctx, { ...request, title: 'Newer' }));

    const meetings = await services.meetingService.listMeetings(ctx);
    expect(meetings.map((meeting) => meeting.id)).toEqual([newer.meeting.id, older.meeting.id]);
  });

  it('reports failed deliveries without failing the operation', async () => {
    const { services, ctx, ann, notifications } = await setup();
    notifications.outcome = 'error';
    const detail = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'Sync',
        slots: slots(1),
        participants: { contactIds: [ann] },
      }),
    );

    const sent = expectOk(await services.meetingService.sendInvitations(ctx, detail.meeting.id));
    expect(sent.meeting.status).toBe('sent');
    expect(sent.deliveries).toEqual({
      attempted: 1,
      delivered: 0,
      simulated: 0,
      failed: 1,
      failures: [{ recipient: 'ann@example.test', error: 'delivery failed' }],
    });
  });

  it('reports a failed invitation step once the meeting is sent', async () => {
    const { services, ctx, ann, notifications } = await setup();
    const detail = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'Sync',
        slots: slots(1),
        participants: { contactIds: [ann] },
      }),
    );
    jest
      .spyOn(services.participantRepository, 'listBindings')
      .mockRejectedValue(new StorageTimeoutError('participants.list', 1000));

    const sent = expectOk(await services.meetingService.sendInvitations(ctx, detail.meeting.id));

    expect(sent.meeting.status).toBe('sent');
    expect(sent.deliveries).toEqual({
      attempted: 0,
      delivered: 0,
      simulated: 0,
      failed: 1,
      failures: [{ recipient: null, error: 'Storage operation "participants.list" timed out after 1000ms' }],
    });
    expect(notifications.log).toEqual([]);
    expect(await services.meetingRepository.getById(detail.meeting.id)).toMatchObject({ status: 'sent' });
  });

  it('redraws every token when one of them is already taken', async () => {
    const taken = 'A'.repeat(43);
    const generateToken = jest
      .fn<string, []>()
      .mockReturnValueOnce(taken)
      .mockReturnValueOnce(taken)
      .mockReturnValueOnce('B'.repeat(43))
      .mockReturnValueOnce('C'.repeat(43));
    const harness = buildHarness({ generateToken });
    const ctx = await registerOrganizer(harness.services, 'olive@example.test');
    const ann = await addContact(harness.services, ctx, 'Ann', 'ann@example.test');
    const bob = await addContact(harness.services, ctx, 'Bob', 'bob@example.test');

    const detail = expectOk(
      await harness.services.meetingService.createMeeting(ctx, {
        title: 'Sync',
        slots: slots(1),
        participants: { contactIds: [ann, bob] },
      }),
    );

    expect(generateToken).toHaveBeenCalledTimes(4);
    expect(harness.db.ids('meetings')).toEqual([detail.meeting.id]);
    expect(harness.db.ids('participantTokens')).toEqual(['B'.repeat(43), 'C'.repeat(43)]);
  });

  it('stores nothing when no unique token can be drawn', async () => {
    const harness = buildHarness({ generateToken: () => 'A'.repeat(43) });
    const { services, db } = harness;
    const ctx = await registerOrganizer(services, 'olive@example.test');
    const ann = await addContact(services, ctx, 'Ann', 'ann@example.test');
    const bob = await addContact(services, ctx, 'Bob', 'bob@example.test');
    const first = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'First',
        slots: slots(1),
        participants: { contactIds: [ann] },
      }),
    );

    const second = await services.meetingService.createMeeting(ctx, {
      title: 'Second',
      slots: slots(2),
      participants: { contactIds: [bob] },
    });

    expect(second).toEqual({
      ok: false,
      error: {
        kind: 'conflict',
        reason: 'token_collision',
        message: 'Could not issue a unique token after 5 attempts.',
      },
    });
    expect(db.ids('meetings')).toEqual([first.meeting.id]);
    expect(db.ids('timeSlots')).toEqual([first.slots[0].id]);
    expect(db.ids('meetingParticipants')).toEqual([`${first.meeting.id}_${ann}`]);
    expect(await services.meetingService.listMeetings(ctx)).toHaveLength(1);
  });
});
