import type { ContactRecord } from '../../../types/scheduling';

export type CreateContactInput = {
  ownerId: string;
  name: string;
  email: string;
  createdAt: Date;
};

export type UpdateContactInput = {
  name: string;
  email: string;
  updatedAt: Date;
};

export type CreateContactResult =
  | { outcome: 'created'; contact: ContactRecord }
  | { outcome: 'existing'; contact: ContactRecord };

export type UpdateContactResult =
  | { outcome: 'updated'; contact: ContactRecord }
  | { outcome: 'not_found' }
  | { outcome: 'duplicate_email'; existingContactId: string };

export type DeleteContactResult =
  | { outcome: 'deleted'; removedMemberships: number }
  | { outcome: 'not_found' }
  | { outcome: 'in_use'; meetingIds: string[] };

export interface ContactRepository {
  create(input: CreateContactInput): Promise<CreateContactResult>;
  getById(contactId: string): Promise<ContactRecord | null>;
  getByIds(contactIds: string[]): Promise<ContactRecord[]>;
  listByOwner(ownerId: string): Promise<ContactRecord[]>;
  update(contactId: string, input: UpdateContactInput): Promise<UpdateContactResult>;
  deleteIfUnused(contactId: string): Promise<DeleteContactResult>;
}
