import {
  addContact,
  buildHarness,
  expectOk,
  registerOrganizer,
} from '../../__tests__/helpers/harness';
import { invoke } from '../../__tests__/helpers/http';
import { createParticipantRouter } from '../participant';

async function setup() {
  const harness = buildHarness();
  const { services } = harness;
  const ctx = await registerOrganizer(services, 'olive@example.test', 'Olive');
  const ann = await addContact(services, ctx, 'Ann', 'ann@example.test');
  const detail = expectOk(
    await services.meetingService.createMeeting(ctx, {
      title: 'Sync',
      slots: [{ startsAt: new Date('2026-03-02T10:00:00.000Z') }],
      participants: { contactIds: [ann] },
    }),
  );
  const binding = await services.participantRepository.getBinding(detail.meeting.id, ann);
  if (!binding) {
    throw new Error('binding missing');
  }
  return {
    ...harness,
    router: createParticipantRouter(services),
    token: binding.token,
    slotId: detail.slots[0].id,
    meetingId: detail.meeting.id,
  };
}

const INVALID_LINK = { code: 'invalid_link', message: 'This link is invalid or has expired.' };

describe('participant routes', () => {
  it('serves the response page data without caching', async () => {
    const { router, token, slotId } = await setup();

    const { res } = await invoke(router, 'get', '/', { query: { token } });

    expect(res.statusCode).toBe(200);
    expect(res.headers['cache-control']).toBe('no-store');
    expect(res.body).toMatchObject({
      meeting: { title: 'Sync', organizerName: 'Olive', status: 'draft' },
      acceptingResponses: true,
      participant: { name: 'Ann' },
      slots: [{ id: slotId, label: 'Monday, March 02, 2026 at 10:00 AM (60 min)' }],
      answers: {},
      suggestion: null,
    });
  });

  it('answers every token failure with the same invalid link response', async () => {
    const { router } = await setup();
    const missing = await invoke(router, 'get', '/', {});
    const malformed = await invoke(router, 'get', '/', { query: { token: 'nope' } });
    const unknown = await invoke(router, 'post', '/', {
      query: { token: 'z'.repeat(43) },
      body: { answers: {} },
    });

    for (const { res } of [missing, malformed, unknown]) {
      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual(INVALID_LINK);
    }
  });

  it('records answers keyed by slot id', async () => {
    const { router, token, slotId, notifications } = await setup();

    const { res } = await invoke(router, 'post', '/', {
      query: { token },
      body: { answers: { [slotId]: 'maybe' } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      firstSubmission: true,
      responses: [{ slotId, availability: 'maybe' }],
      suggestion: null,
    });
    expect(notifications.recipients('response-received')).toEqual(['olive@example.test']);
  });

  it('validates availability values before touching storage', async () => {
    const { router, token, slotId } = await setup();

    const { res } = await invoke(router, 'post', '/', {
      query: { token },
      body: { answers: { [slotId]: 'sometimes' } },
    });

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ code: 'validation_failed', message: 'Invalid request body' });
  });

  it('reports a closed meeting as a state conflict', async () => {
    const { router, token, slotId, services, meetingId } = await setup();
    const meeting = await services.meetingRepository.getById(meetingId);
    if (!meeting) {
      throw new Error('meeting missing');
    }
    expectOk(
      await services.meetingService.cancelMeeting(
        { organizerId: meeting.organizerId, organizerEmail: meeting.organizerEmail },
        meetingId,
      ),
    );

    const { res } = await invoke(router, 'post', '/', {
      query: { token },
      body: { answers: { [slotId]: 'available' } },
    });

    expect(res.statusCode).toBe(409);
    expect(res.body).toEqual({
      code: 'invalid_state',
      reason: 'meeting_cancelled',
      message: 'This meeting has been cancelled.',
      details: { status: 'cancelled' },
    });
  });

  it('stores and replaces a suggested alternative', async () => {
    const { router, token } = await setup();

    const first = await invoke(router, 'post', '/suggestion', {
      query: { token },
      body: { startsAt: '2026-03-04T16:00:00+02:00', note: 'Any afternoon' },
    });
    const second = await invoke(router, 'post', '/suggestion', {
      query: { token },
      body: { startsAt: '2026-03-05T09:30:00Z' },
    });

    expect(first.res.body).toMatchObject({
      replaced: false,
      suggestion: { startsAt: new Date('2026-03-04T14:00:00.000Z'), note: 'Any afternoon' },
    });
    expect(second.res.body).toMatchObject({
      replaced: true,
      suggestion: { startsAt: new Date('2026-03-05T09:30:00.000Z'), note: null },
    });
  });
});
