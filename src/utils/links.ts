export function participantResponseUrl(baseUrl: string, token: string): string {
  return `${baseUrl}?token=${encodeURIComponent(token)}`;
}

/** Informational link for organizer emails; grants nothing on its own. */
export function organizerDashboardUrl(baseUrl: string, meetingId: string): string {
  return `${baseUrl}?page=organizer&meeting_id=${encodeURIComponent(meetingId)}`;
}
