import {
  addContact,
  buildHarness,
  expectOk,
  registerOrganizer,
} from '../../__tests__/helpers/harness';

const SLOT = { startsAt: new Date('2026-03-02T10:00:00.000Z') };

describe('contacts', () => {
  it('returns the stored contact when the same email is added again', async () => {
    const { services } = buildHarness();
    const ctx = await registerOrganizer(services, 'olive@example.test');

    const first = expectOk(
      await services.contactService.createContact(ctx, { name: 'Ann', email: 'ann@example.test' }),
    );
    const second = expectOk(
      await services.contactService.createContact(ctx, { name: 'Annie', email: ' ANN@example.test' }),
    );

    expect(first.created).toBe(true);
    expect(second).toEqual({ contact: first.contact, created: false });
    expect(second.contact.name).toBe('Ann');
    expect(await services.contactService.listContacts(ctx)).toHaveLength(1);
  });

  it('settles concurrent creates on one contact', async () => {
    const { services } = buildHarness();
    const ctx = await registerOrganizer(services, 'olive@example.test');

    const [left, right] = await Promise.all([
      services.contactService.createContact(ctx, { name: 'Ann', email: 'ann@example.test' }),
      services.contactService.createContact(ctx, { name: 'Ann', email: 'ann@example.test' }),
    ]);

    expect(expectOk(left).contact.id).toBe(expectOk(right).contact.id);
    expect([expectOk(left).created, expectOk(right).created].sort()).toEqual([false, true]);
    expect(await services.contactService.listContacts(ctx)).toHaveLength(1);
  });

  it('scopes email uniqueness to the owning organizer', async () => {
    const { services } = buildHarness();
    const olive = await registerOrganizer(services, 'olive@example.test');
    const pat = await registerOrganizer(services, 'pat@example.test');

    const oliveAnn = await addContact(services, olive, 'Ann', 'ann@example.test');
    const patAnn = await addContact(services, pat, 'Ann', 'ann@example.test');
    expect(oliveAnn).not.toBe(patAnn);

    const foreign = await services.contactService.getContact(pat, oliveAnn);
    expect(foreign.ok).toBe(false);
    if (!foreign.ok) {
      expect(foreign.error).toMatchObject({ kind: 'forbidden', reason: 'not_owner' });
    }
  });

  it('refuses to move a contact onto another contact email', async () => {
    const { services } = buildHarness();
    const ctx = await registerOrganizer(services, 'olive@example.test');
    const ann = await addContact(services, ctx, 'Ann', 'ann@example.test');
    const bob = await addContact(services, ctx, 'Bob', 'bob@example.test');

    const result = await services.contactService.updateContact(ctx, bob, {
      name: 'Bob',
      email: 'ann@example.test',
    });
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'conflict',
        reason: 'duplicate_contact_email',
        message: 'Another contact already uses this email address.',
        details: { contactId: ann },
      },
    });

    const renamed = expectOk(
      await services.contactService.updateContact(ctx, bob, { name: 'Robert', email: 'rob@example.test' }),
    );
    expect(renamed).toMatchObject({ id: bob, name: 'Robert', email: 'rob@example.test' });

    // The old address is free again.
    const rebound = expectOk(
      await services.contactService.createContact(ctx, { name: 'New Bob', email: 'bob@example.test' }),
    );
    expect(rebound.created).toBe(true);
  });

  it('keeps contacts that are invited to a meeting', async () => {
    const { services } = buildHarness();
    const ctx = await registerOrganizer(services, 'olive@example.test');
    const ann = await addContact(services, ctx, 'Ann', 'ann@example.test');
    const detail = expectOk(
      await services.meetingService.createMeeting(ctx, {
        title: 'Sync',
        slots: [SLOT],
        participants: { contactIds: [ann] },
      }),
    );

    const result = await services.contactService.deleteContact(ctx, ann);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'constraint_violation',
        reason: 'contact_in_use',
        message: 'This contact is invited to one or more meetings and cannot be deleted.',
        details: { meetingIds: [detail.meeting.id] },
      },
    });
  });

  it('removes group memberships with a deleted contact', async () => {
    const { services, db } = buildHarness();
    const ctx = await registerOrganizer(services, 'olive@example.test');
    const ann = await addContact(services, ctx, 'Ann', 'ann@example.test');
    const group = expectOk(await services.groupService.createGroup(ctx, { name: 'Design' }));
    expectOk(await services.groupService.addMember(ctx, group.id, ann));

    const deleted = expectOk(await services.contactService.deleteContact(ctx, ann));
    expect(deleted).toEqual({ contactId: ann, removedMemberships: 1 });
    expect(db.ids('groupMembers')).toEqual([]);
  });
});

describe('group sharing', () => {
  async function sharedSetup() {
    const harness = buildHarness();
    const { services } = harness;
    const olive = await registerOrganizer(services, 'olive@example.test', 'Olive');
    const pat = await registerOrganizer(services, 'pat@example.test', 'Pat');
    const ann = await addContact(services, olive, 'Ann', 'ann@example.test');
    const group = expectOk(
      await services.groupService.createGroup(olive, { name: 'Design team', description: 'UX crew' }),
    );
    expectOk(await services.groupService.addMember(olive, group.id, ann));
    return { harness, services, olive, pat, ann, group };
  }

  it('shows a group to a grantee once it is shared', async () => {
    const { services, olive, pat, ann, group } = await sharedSetup();
    expect(await services.groupService.listGroups(pat)).toEqual([]);

    const share = expectOk(await services.groupService.grantShare(olive, group.id, 'PAT@example.test'));
    expect(share.granteeEmail).toBe('pat@example.test');

    const visible = await services.groupService.listGroups(pat);
    expect(visible).toHaveLength(1);
    expect(visible[0]).toMatchObject({
      id: group.id,
      name: 'Design team',
      shared: true,
      access: 'shared',
      memberCount: 1,
    });

    const members = expectOk(await services.groupService.listGroupMembers(pat, group.id));
    expect(members.map((member) => member.id)).toEqual([ann]);
  });

  it('lets a grantee invite shared members but not edit the group', async () => {
    const { services, olive, pat, ann, group } = await sharedSetup();
    expectOk(await services.groupService.grantShare(olive, group.id, 'pat@example.test'));

    const viaGroup = expectOk(
      await services.meetingService.createMeeting(pat, {
        title: 'Design review',
        slots: [SLOT],
        participants: { groupIds: [group.id] },
      }),
    );
    expect(viaGroup.participants.map((participant) => participant.contactId)).toEqual([ann]);
    expect(viaGroup.meeting.organizerName).toBe('Pat');

    const direct = expectOk(
      await services.meetingService.createMeeting(pat, {
        title: 'Follow-up',
        slots: [SLOT],
        participants: { contactIds: [ann] },
      }),
    );
    expect(direct.participants).toHaveLength(1);

    const rename = await services.groupService.updateGroup(pat, group.id, { name: 'Mine now' });
    expect(rename.ok).toBe(false);
    if (!rename.ok) {
      expect(rename.error.reason).toBe('not_owner');
    }
  });

  it('cuts off access when the owner stops sharing', async () => {
    const { services, olive, pat, ann, group } = await sharedSetup();
    expectOk(await services.groupService.grantShare(olive, group.id, 'pat@example.test'));

    const unshared = expectOk(await services.groupService.setShared(olive, group.id, false));
    expect(unshared.revokedShares).toBe(1);
    expect(unshared.group.shared).toBe(false);
    expect(await services.groupService.listGroups(pat)).toEqual([]);

    const viaGroup = await services.meetingService.createMeeting(pat, {
      title: 'Design review',
      slots: [SLOT],
      participants: { groupIds: [group.id] },
    });
    expect(viaGroup.ok).toBe(false);
    if (!viaGroup.ok) {
      expect(viaGroup.error.reason).toBe('not_owner');
    }

    const direct = await services.meetingService.createMeeting(pat, {
      title: 'Follow-up',
      slots: [SLOT],
      participants: { contactIds: [ann] },
    });
    expect(direct).toEqual({
      ok: false,
      error: {
        kind: 'forbidden',
        reason: 'contact_not_visible',
        message: 'You can only invite your own contacts or members of groups shared with you.',
        details: { contactIds: [ann] },
      },
    });
  });

  it('rejects duplicate and self shares', async () => {
    const { services, olive, group } = await sharedSetup();
    expectOk(await services.groupService.grantShare(olive, group.id, 'pat@example.test'));

    const duplicate = await services.groupService.grantShare(olive, group.id, 'Pat@Example.test');
    const self = await services.groupService.grantShare(olive, group.id, 'olive@example.test');
    expect(duplicate.ok ? null : duplicate.error.reason).toBe('duplicate_share');
    expect(self.ok ? null : self.error.reason).toBe('invalid_input');
  });

  it('only adds the owner contacts to a group', async () => {
    const { services, olive, pat, group } = await sharedSetup();
    const patContact = await addContact(services, pat, 'Zed', 'zed@example.test');

    const result = await services.groupService.addMember(olive, group.id, patContact);
    expect(result.ok ? null : result.error.reason).toBe('contact_not_visible');
  });

  it('deletes a group with its memberships and shares', async () => {
    const { harness, services, olive, group } = await sharedSetup();
    expectOk(await services.groupService.grantShare(olive, group.id, 'pat@example.test'));

    const deleted = expectOk(await services.groupService.deleteGroup(olive, group.id));
    expect(deleted).toEqual({ groupId: group.id, removedMembers: 1, removedShares: 1 });
    expect(harness.db.ids('groupMembers')).toEqual([]);
    expect(harness.db.ids('groupShares')).toEqual([]);
  });

  it('revokes one grant and keeps the group shared with the rest', async () => {
    const { services } = buildHarness();
    const olive = await registerOrganizer(services, 'olive@example.test');
    const pat = await registerOrganizer(services, 'pat@example.test');
    const group = expectOk(await services.groupService.createGroup(olive, { name: 'Team' }));
    expectOk(await services.groupService.grantShare(olive, group.id, 'Pat@example.test'));
    expectOk(await services.groupService.grantShare(olive, group.id, 'quinn@example.test'));

    expect(
      expectOk(await services.groupService.listGroupShares(olive, group.id)).map((share) => share.granteeEmail),
    ).toEqual(['pat@example.test', 'quinn@example.test']);
    expect((await services.groupService.listGroupShares(pat, group.id)).ok).toBe(false);

    expect(await services.groupService.revokeShare(olive, group.id, 'PAT@example.test')).toEqual({
      ok: true,
      value: { groupId: group.id, granteeEmail: 'pat@example.test' },
    });
    expect(await services.groupService.listGroups(pat)).toEqual([]);
    expect(expectOk(await services.groupService.getAccessibleGroup(olive, group.id)).group.shared).toBe(true);

    const again = await services.groupService.revokeShare(olive, group.id, 'pat@example.test');
    expect(again.ok ? null : again.error.reason).toBe('share_not_found');
  });

  it('removes a member once', async () => {
    const { services } = buildHarness();
    const ctx = await registerOrganizer(services, 'olive@example.test');
    const ann = await addContact(services, ctx, 'Ann', 'ann@example.test');
    const group = expectOk(await services.groupService.createGroup(ctx, { name: 'Team' }));
    expectOk(await services.groupService.addMember(ctx, group.id, ann));

    expect(expectOk(await services.groupService.removeMember(ctx, group.id, ann))).toEqual({
      groupId: group.id,
      contactId: ann,
    });
    expect(expectOk(await services.groupService.listGroupMembers(ctx, group.id))).toEqual([]);

    const again = await services.groupService.removeMember(ctx, group.id, ann);
    expect(again.ok ? null : again.error.reason).toBe('membership_not_found');
  });
});
