import type { ParticipantBindingRecord } from '../../../types/scheduling';

export type CreateBindingResult =
  | { outcome: 'created'; binding: ParticipantBindingRecord }
  | { outcome: 'existing'; binding: ParticipantBindingRecord }
  | { outcome: 'token_collision' }
  | { outcome: 'meeting_not_found' }
  | { outcome: 'contact_not_found' };

export type ResolvedToken = {
  meetingId: string;
  contactId: string;
};

export interface ParticipantRepository {
  /**
   * Creates the (meeting, contact) binding together with its token index entry.
   * An existing binding is returned untouched, whatever token was offered.
   */
  createBinding(
    meetingId: string,
    contactId: string,
    token: string,
    createdAt: Date,
  ): Promise<CreateBindingResult>;
  getBinding(meetingId: string, contactId: string): Promise<ParticipantBindingRecord | null>;
  listBindings(meetingId: string): Promise<ParticipantBindingRecord[]>;
  resolveToken(token: string): Promise<ResolvedToken | null>;
}
