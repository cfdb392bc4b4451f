import * as functions from 'firebase-functions';
import type { ContactRecord, RequestContext } from '../../../types/scheduling';
import { MAX_NAME_LENGTH, sanitizeSingleLine } from '../../../utils/inputSanitization';
import type { ContactRepository } from '../../repositories/contacts/ContactRepository';
import { failure, propagate, success, type DomainResult } from '../common/results';

export type ContactInput = {
  name: string;
  email: string;
};

export type CreateContactOutcome = {
  contact: ContactRecord;
  created: boolean;
};

export class ContactDomainService {
  constructor(
    private readonly contactRepository: ContactRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async listContacts(ctx: RequestContext): Promise<ContactRecord[]> {
    return this.contactRepository.listByOwner(ctx.organizerId);
  }

  async getContact(ctx: RequestContext, contactId: string): Promise<DomainResult<ContactRecord>> {
    const contact = await this.contactRepository.getById(contactId);
    if (!contact) {
      return failure('not_found', 'contact_not_found', 'Contact not found.');
    }
    if (contact.ownerId !== ctx.organizerId) {
      return failure('forbidden', 'not_owner', 'You do not have access to this contact.');
    }
    return success(contact);
  }

  /**
   * Idempotent on (owner, email): a repeated call returns the stored contact
   * with `created: false` and leaves its name untouched.
   */
  async createContact(
    ctx: RequestContext,
    input: ContactInput,
  ): Promise<DomainResult<CreateContactOutcome>> {
    const name = sanitizeSingleLine(input.name, MAX_NAME_LENGTH);
    if (!name) {
      return failure('validation_failed', 'invalid_input', 'Contact name is required.');
    }

    const result = await this.contactRepository.create({
      ownerId: ctx.organizerId,
      name,
      email: input.email,
      createdAt: this.now(),
    });

    if (result.outcome === 'created') {
      functions.logger.info(`[contacts] Organizer ${ctx.organizerId} added contact ${result.contact.id}`);
    }
    return success({ contact: result.contact, created: result.outcome === 'created' });
  }

  async updateContact(
    ctx: RequestContext,
    contactId: string,
    input: ContactInput,
  ): Promise<DomainResult<ContactRecord>> {
    const existing = await this.getContact(ctx, contactId);
    if (!existing.ok) {
      return existing;
    }

    const name = sanitizeSingleLine(input.name, MAX_NAME_LENGTH);
    if (!name) {
      return failure('validation_failed', 'invalid_input', 'Contact name is required.');
    }

    const result = await this.contactRepository.update(contactId, {
      name,
      email: input.email,
      updatedAt: this.now(),
    });

    switch (result.outcome) {
      case 'not_found':
        return failure('not_found', 'contact_not_found', 'Contact not found.');
      case 'duplicate_email':
        return failure(
          'conflict',
          'duplicate_contact_email',
          'Another contact already uses this email address.',
          { contactId: result.existingContactId },
        );
      case 'updated':
        return success(result.contact);
    }
  }

  async deleteContact(
    ctx: RequestContext,
    contactId: string,
  ): Promise<DomainResult<{ contactId: string; removedMemberships: number }>> {
    const existing = await this.getContact(ctx, contactId);
    if (!existing.ok) {
      return propagate(existing.error);
    }

    const result = await this.contactRepository.deleteIfUnused(contactId);
    switch (result.outcome) {
      case 'not_found':
        return failure('not_found', 'contact_not_found', 'Contact not found.');
      case 'in_use':
        return failure(
          'constraint_violation',
          'contact_in_use',
          'This contact is invited to one or more meetings and cannot be deleted.',
          { meetingIds: result.meetingIds },
        );
      case 'deleted':
        functions.logger.info(`[contacts] Organizer ${ctx.organizerId} deleted contact ${contactId}`);
        return success({ contactId, removedMemberships: result.removedMemberships });
    }
  }
}
