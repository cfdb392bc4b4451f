import type {
  Availability,
  ParticipantBindingRecord,
  ResponseRecord,
  TimeSlotRecord,
} from '../types/scheduling';

export type ScoringPolicy = Readonly<{
  availableWeight: number;
  maybeWeight: number;
}>;

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  availableWeight: 1,
  maybeWeight: 0.5,
};

export type SlotRanking = {
  slotId: string;
  startsAt: Date;
  durationMinutes: number;
  available: number;
  maybe: number;
  unavailable: number;
  /** Invited participants with no answer for this slot. */
  pending: number;
  score: number;
  /** (available + maybe) / invited; 0 when nobody is invited. */
  coverage: number;
};

export type RankSlotsInput = {
  slots: TimeSlotRecord[];
  responses: ResponseRecord[];
  invitedContactIds: string[];
  policy?: ScoringPolicy;
};

export function scoreCounts(
  counts: { available: number; maybe: number },
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
): number {
  return counts.available * policy.availableWeight + counts.maybe * policy.maybeWeight;
}

/**
 * Ranks slots by score, highest first. Ties go to the earlier start, then the
 * lower slot id, so the order is stable for identical inputs.
 */
export function rankSlots(input: RankSlotsInput): SlotRanking[] {
  const policy = input.policy ?? DEFAULT_SCORING_POLICY;
  const invited = new Set(input.invitedContactIds);

  const answersBySlot = new Map<string, Map<string, Availability>>();
  input.responses.forEach((response) => {
    const answers = answersBySlot.get(response.slotId) ?? new Map<string, Availability>();
    answers.set(response.contactId, response.availability);
    answersBySlot.set(response.slotId, answers);
  });

  const rankings = input.slots.map((slot): SlotRanking => {
    const answers = answersBySlot.get(slot.id) ?? new Map<string, Availability>();
    const counts = { available: 0, maybe: 0, unavailable: 0 };
    answers.forEach((availability) => {
      counts[availability] += 1;
    });

    let answeredByInvited = 0;
    invited.forEach((contactId) => {
      if (answers.has(contactId)) {
        answeredByInvited += 1;
      }
    });

    return {
      slotId: slot.id,
      startsAt: slot.startsAt,
      durationMinutes: slot.durationMinutes,
      ...counts,
      pending: invited.size - answeredByInvited,
      score: scoreCounts(counts, policy),
      coverage: invited.size === 0 ? 0 : (counts.available + counts.maybe) / invited.size,
    };
  });

  return rankings.sort(
    (left, right) =>
      right.score - left.score ||
      left.startsAt.getTime() - right.startsAt.getTime() ||
      left.slotId.localeCompare(right.slotId),
  );
}

export type MatrixCell = Availability | 'pending' | 'no_response';

export type MatrixRow = {
  contactId: string;
  responded: boolean;
  cells: Record<string, MatrixCell>;
};

/**
 * Participant x slot grid. A participant who never submitted shows `pending`
 * everywhere; one who submitted without answering a slot shows `no_response`.
 */
export function buildAvailabilityMatrix(
  bindings: Pick<ParticipantBindingRecord, 'contactId' | 'responded'>[],
  slots: Pick<TimeSlotRecord, 'id'>[],
  responses: ResponseRecord[],
): MatrixRow[] {
  const answers = new Map<string, Availability>();
  responses.forEach((response) => {
    answers.set(`${response.contactId}/${response.slotId}`, response.availability);
  });

  return bindings.map((binding) => {
    const cells: Record<string, MatrixCell> = {};
    slots.forEach((slot) => {
      const answer = answers.get(`${binding.contactId}/${slot.id}`);
      if (answer) {
        cells[slot.id] = answer;
      } else {
        cells[slot.id] = binding.responded ? 'no_response' : 'pending';
      }
    });
    return { contactId: binding.contactId, responded: binding.responded, cells };
  });
}
