import {
  addContact,
  buildHarness,
  registerOrganizer,
} from '../../__tests__/helpers/harness';
import * as functions from 'firebase-functions';
import { invoke } from '../../__tests__/helpers/http';
import { StorageTimeoutError } from '../../services/repositories/common/errors';
import { createMeetingsRouter } from '../meetings';

async function setup() {
  const harness = buildHarness();
  const { services } = harness;
  const ctx = await registerOrganizer(services, 'olive@example.test', 'Olive');
  const ann = await addContact(services, ctx, 'Ann', 'ann@example.test');
  return { ...harness, ctx, ann, router: createMeetingsRouter(services) };
}

const CREATE_BODY = {
  title: 'Sync',
  slots: [{ startsAt: '2026-03-02T10:00:00Z', durationMinutes: 45 }],
};

describe('meetings routes', () => {
  it('creates and sends a meeting by default', async () => {
    const { router, ctx, ann, notifications } = await setup();

    const { res } = await invoke(router, 'post', '/', {
      context: ctx,
      body: { ...CREATE_BODY, participants: { contactIds: [ann] } },
    });

    expect(res.statusCode).toBe(201);
    expect(res.body).toMatchObject({
      meeting: { title: 'Sync', status: 'sent' },
      slots: [{ durationMinutes: 45, label: 'Monday, March 02, 2026 at 10:00 AM (45 min)' }],
      deliveries: { attempted: 1, simulated: 1, failed: 0 },
    });
    expect(notifications.recipients('invitation')).toEqual(['ann@example.test']);
  });

  it('keeps the meeting as a draft when sendNow is false', async () => {
    const { router, ctx, ann, notifications } = await setup();

    const { res } = await invoke(router, 'post', '/', {
      context: ctx,
      body: { ...CREATE_BODY, participants: { contactIds: [ann] }, sendNow: false },
    });

    expect(res.statusCode).toBe(201);
    expect(res.body).toMatchObject({ meeting: { status: 'draft' }, deliveries: null });
    expect(notifications.log).toEqual([]);
  });

  it('rejects a body without participants', async () => {
    const { router, ctx } = await setup();

    const { res } = await invoke(router, 'post', '/', {
      context: ctx,
      body: { ...CREATE_BODY, participants: {} },
    });

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      code: 'validation_failed',
      message: 'Invalid request body',
      details: { participants: ['Select at least one contact or group'] },
    });
  });

  it('rejects slot times without a zone offset', async () => {
    const { router, ctx, ann } = await setup();

    const { res } = await invoke(router, 'post', '/', {
      context: ctx,
      body: {
        title: 'Sync',
        slots: [{ startsAt: '2026-03-02 10:00' }],
        participants: { contactIds: [ann] },
      },
    });

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ code: 'validation_failed' });
  });

  it('maps domain failures to status codes', async () => {
    const { router, ctx, ann, services } = await setup();
    const created = await invoke(router, 'post', '/', {
      context: ctx,
      body: { ...CREATE_BODY, participants: { contactIds: [ann] } },
    });
    const meeting = await services.meetingService.listMeetings(ctx);
    const meetingId = meeting[0].id;
    expect(created.res.statusCode).toBe(201);

    const other = await registerOrganizer(services, 'mallory@example.test');
    const forbidden = await invoke(router, 'get', '/:meetingId', {
      context: other,
      params: { meetingId },
    });
    expect(forbidden.res.statusCode).toBe(403);
    expect(forbidden.res.body).toEqual({
      code: 'forbidden',
      reason: 'not_owner',
      message: 'Only the organizer can manage this meeting.',
    });

    const missing = await invoke(router, 'get', '/:meetingId', {
      context: ctx,
      params: { meetingId: 'meeting-404' },
    });
    expect(missing.res.statusCode).toBe(404);

    const resend = await invoke(router, 'post', '/:meetingId/send', {
      context: ctx,
      params: { meetingId },
    });
    expect(resend.res.statusCode).toBe(409);
    expect(resend.res.body).toMatchObject({ code: 'invalid_state', reason: 'already_sent' });
  });

  it('finalizes through the route and reports the chosen slot', async () => {
    const { router, ctx, ann, services } = await setup();
    await invoke(router, 'post', '/', {
      context: ctx,
      body: { ...CREATE_BODY, participants: { contactIds: [ann] } },
    });
    const [meeting] = await services.meetingService.listMeetings(ctx);
    const [slot] = await services.meetingRepository.listSlots(meeting.id);

    const invalid = await invoke(router, 'post', '/:meetingId/finalize', {
      context: ctx,
      params: { meetingId: meeting.id },
      body: {},
    });
    expect(invalid.res.statusCode).toBe(400);

    const { res } = await invoke(router, 'post', '/:meetingId/finalize', {
      context: ctx,
      params: { meetingId: meeting.id },
      body: { slotId: slot.id },
    });
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      meeting: { status: 'finalized', finalizedSlot: 'Monday, March 02, 2026 at 10:00 AM' },
      slot: { id: slot.id },
      deliveries: { attempted: 1 },
    });
  });

  it('answers 500 with the route message when the handler throws', async () => {
    const { router } = await setup();

    const { res, next } = await invoke(router, 'get', '/', {});

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ code: 'server_error', message: 'Failed to fetch meetings' });
    expect(next).not.toHaveBeenCalled();
    expect(functions.logger.error).toHaveBeenCalledWith(
      '[meetings] Failed to fetch meetings:',
      expect.any(Error),
    );
  });

  it('answers 503 when storage times out', async () => {
    const { router, ctx, services } = await setup();
    jest
      .spyOn(services.meetingService, 'listMeetings')
      .mockRejectedValue(new StorageTimeoutError('meetings.listByOrganizer', 1000));

    const { res } = await invoke(router, 'get', '/', { context: ctx });

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({
      code: 'storage_unavailable',
      message: 'The service is temporarily unavailable. Please try again.',
    });
  });
});
