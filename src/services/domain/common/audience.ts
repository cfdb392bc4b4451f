import type { ContactRecord, ParticipantBindingRecord } from '../../../types/scheduling';
import type { ContactRepository } from '../../repositories/contacts/ContactRepository';
import type { ParticipantRepository } from '../../repositories/participants/ParticipantRepository';

export type MeetingParticipant = {
  binding: ParticipantBindingRecord;
  contact: ContactRecord;
};

/**
 * Bindings of a meeting joined with their contacts, in invitation order.
 * Bindings whose contact record is gone are skipped.
 */
export async function loadMeetingParticipants(
  participantRepository: Pick<ParticipantRepository, 'listBindings'>,
  contactRepository: Pick<ContactRepository, 'getByIds'>,
  meetingId: string,
): Promise<MeetingParticipant[]> {
  const bindings = await participantRepository.listBindings(meetingId);
  const contacts = await contactRepository.getByIds(bindings.map((binding) => binding.contactId));
  const contactsById = new Map(contacts.map((contact) => [contact.id, contact]));

  return bindings.flatMap((binding) => {
    const contact = contactsById.get(binding.contactId);
    return contact ? [{ binding, contact }] : [];
  });
}
