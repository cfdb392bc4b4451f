import { escapeHtml } from '../utils/inputSanitization';

export type RenderedEmail = {
  subject: string;
  html: string;
  text: string;
};

export type ParticipantNotice = {
  participantName: string;
  meetingTitle: string;
  meetingDescription: string;
  organizerName: string;
  organizerEmail: string;
  responseUrl: string;
  slots: string[];
};

export type FinalizedNotice = {
  participantName: string;
  meetingTitle: string;
  organizerName: string;
  organizerEmail: string;
  finalizedSlot: string;
};

export type ResponseReceivedNotice = {
  participantName: string;
  meetingTitle: string;
  dashboardUrl: string;
};

const ACCENT = {
  invitation: '#4f46e5',
  reminder: '#d97706',
  update: '#ea580c',
  confirmed: '#16a34a',
};

function layout(accent: string, heading: string, body: string): string {
  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
  <div style="background-color: #ffffff; border-radius: 12px; padding: 40px; box-shadow: 0 2px 8px rgba(0,0,0,0.1);">
    <h1 style="color: ${accent}; margin-top: 0; font-size: 26px; font-weight: 700;">${escapeHtml(heading)}</h1>
    ${body}
  </div>
</body>
</html>
  `.trim();
}

function button(accent: string, href: string, label: string): string {
  return `<div style="margin: 30px 0; text-align: center;">
      <a href="${escapeHtml(href)}" style="display: inline-block; background-color: ${accent}; color: #ffffff; padding: 14px 32px; text-decoration: none; border-radius: 8px; font-weight: 600; font-size: 16px;">${escapeHtml(label)}</a>
    </div>`;
}

function slotListHtml(slots: string[]): string {
  const items = slots.map((slot) => `<li>${escapeHtml(slot)}</li>`).join('\n        ');
  return `<ul style="background-color: #f5f5f5; border-radius: 8px; padding: 15px 15px 15px 35px;">
        ${items}
      </ul>`;
}

function slotListText(slots: string[]): string {
  return slots.map((slot) => `  - ${slot}`).join('\n');
}

function organizerLabel(notice: { organizerName: string; organizerEmail: string }): string {
  return notice.organizerName
    ? `${notice.organizerName} (${notice.organizerEmail})`
    : notice.organizerEmail;
}

function participantEmail(
  accent: string,
  heading: string,
  intro: string,
  callToAction: string,
  notice: ParticipantNotice,
): Pick<RenderedEmail, 'html' | 'text'> {
  const description = notice.meetingDescription
    ? `<p style="font-size: 16px; color: #555;">${escapeHtml(notice.meetingDescription)}</p>`
    : '';

  const html = layout(
    accent,
    heading,
    `<p style="font-size: 16px; color: #555;">Hello <strong>${escapeHtml(notice.participantName)}</strong>,</p>
    <p style="font-size: 16px; color: #555;">${escapeHtml(intro)}</p>
    <h2 style="color: ${accent};">${escapeHtml(notice.meetingTitle)}</h2>
    ${description}
    <h3>Proposed time slots</h3>
    ${slotListHtml(notice.slots)}
    ${button(accent, notice.responseUrl, callToAction)}
    <p style="font-size: 14px; color: #888;">Or copy this link: ${escapeHtml(notice.responseUrl)}</p>
    <p style="font-size: 14px; color: #888; margin-top: 30px; padding-top: 20px; border-top: 1px solid #eee;">Organized by ${escapeHtml(organizerLabel(notice))}</p>`,
  );

  const text = [
    heading,
    '',
    `Hello ${notice.participantName},`,
    '',
    intro,
    '',
    notice.meetingTitle,
    ...(notice.meetingDescription ? [notice.meetingDescription] : []),
    '',
    'Proposed time slots:',
    slotListText(notice.slots),
    '',
    `${callToAction}: ${notice.responseUrl}`,
    '',
    `Organized by ${organizerLabel(notice)}`,
  ].join('\n');

  return { html, text };
}

export function renderInvitation(notice: ParticipantNotice): RenderedEmail {
  return {
    subject: `Meeting Invitation: ${notice.meetingTitle}`,
    ...participantEmail(
      ACCENT.invitation,
      'Meeting Invitation',
      "You've been invited to help schedule a meeting. Please let us know which times work for you.",
      'Respond to Invitation',
      notice,
    ),
  };
}

export function renderReminder(notice: ParticipantNotice): RenderedEmail {
  return {
    subject: `Reminder: ${notice.meetingTitle}`,
    ...participantEmail(
      ACCENT.reminder,
      'Availability Reminder',
      "We haven't received your availability yet for this meeting.",
      'Share Your Availability',
      notice,
    ),
  };
}

export function renderScheduleUpdate(notice: ParticipantNotice): RenderedEmail {
  return {
    subject: `Updated Schedule: ${notice.meetingTitle}`,
    ...participantEmail(
      ACCENT.update,
      'Schedule Updated',
      'The proposed time slots have been updated. Please review them and update your availability.',
      'Update Your Response',
      notice,
    ),
  };
}

export function renderFinalized(notice: FinalizedNotice): RenderedEmail {
  const html = layout(
    ACCENT.confirmed,
    'Meeting Confirmed',
    `<p style="font-size: 16px; color: #555;">Hello <strong>${escapeHtml(notice.participantName)}</strong>,</p>
    <p style="font-size: 16px; color: #555;">The meeting has been confirmed for the following time:</p>
    <h2 style="color: ${ACCENT.confirmed};">${escapeHtml(notice.meetingTitle)}</h2>
    <p style="font-size: 18px; font-weight: 600;">${escapeHtml(notice.finalizedSlot)}</p>
    <p style="font-size: 14px; color: #888; margin-top: 30px; padding-top: 20px; border-top: 1px solid #eee;">Organized by ${escapeHtml(organizerLabel(notice))}</p>`,
  );

  const text = [
    'Meeting Confirmed',
    '',
    `Hello ${notice.participantName},`,
    '',
    'The meeting has been confirmed for the following time:',
    '',
    notice.meetingTitle,
    `Confirmed time: ${notice.finalizedSlot}`,
    '',
    `Organized by ${organizerLabel(notice)}`,
  ].join('\n');

  return { subject: `Final Schedule: ${notice.meetingTitle}`, html, text };
}

export function renderResponseReceived(notice: ResponseReceivedNotice): RenderedEmail {
  const html = layout(
    ACCENT.confirmed,
    'New Response Received',
    `<p style="font-size: 16px; color: #555;"><strong>${escapeHtml(notice.participantName)}</strong> has responded to your meeting invitation:</p>
    <h2 style="color: #333;">${escapeHtml(notice.meetingTitle)}</h2>
    ${button(ACCENT.confirmed, notice.dashboardUrl, 'View Responses')}`,
  );

  const text = [
    'New Response Received',
    '',
    `${notice.participantName} has responded to your meeting invitation:`,
    notice.meetingTitle,
    '',
    `View responses at: ${notice.dashboardUrl}`,
  ].join('\n');

  return {
    subject: `Response: ${notice.participantName} replied to ${notice.meetingTitle}`,
    html,
    text,
  };
}
