/**
 * Notification Dispatcher
 * Renders meeting notifications and hands them to the email service. Dispatch
 * happens after the triggering write has committed, so a failure here is only
 * reported, never thrown.
 */

import * as functions from 'firebase-functions';
import type { EmailService } from './email';
import {
  renderFinalized,
  renderInvitation,
  renderReminder,
  renderResponseReceived,
  renderScheduleUpdate,
  type FinalizedNotice,
  type ParticipantNotice,
  type RenderedEmail,
  type ResponseReceivedNotice,
} from './emailTemplates';

export const NOTIFICATION_KINDS = [
  'invitation',
  'reminder',
  'response-received',
  'schedule-update',
  'finalized',
] as const;
export type NotificationKind = (typeof NOTIFICATION_KINDS)[number];

export type NotificationPayloads = {
  invitation: ParticipantNotice;
  reminder: ParticipantNotice;
  'response-received': ResponseReceivedNotice;
  'schedule-update': ParticipantNotice;
  finalized: FinalizedNotice;
};

export type NotificationOutcome = 'delivered' | 'simulated' | 'error';

export type NotificationResult = {
  kind: NotificationKind;
  recipient: string;
  outcome: NotificationOutcome;
  error?: string;
};

export type DeliveryFailure = {
  /** Null when the recipients themselves could not be loaded. */
  recipient: string | null;
  error: string;
};

export type DeliveryReport = {
  attempted: number;
  delivered: number;
  simulated: number;
  failed: number;
  failures: DeliveryFailure[];
};

export interface NotificationDispatcher {
  notify<K extends NotificationKind>(
    kind: K,
    recipient: string,
    payload: NotificationPayloads[K],
  ): Promise<NotificationResult>;
}

type Renderers = { [K in NotificationKind]: (payload: NotificationPayloads[K]) => RenderedEmail };

const RENDERERS: Renderers = {
  invitation: renderInvitation,
  reminder: renderReminder,
  'response-received': renderResponseReceived,
  'schedule-update': renderScheduleUpdate,
  finalized: renderFinalized,
};

export class EmailNotificationDispatcher implements NotificationDispatcher {
  constructor(private readonly emailService: Pick<EmailService, 'send'>) {}

  async notify<K extends NotificationKind>(
    kind: K,
    recipient: string,
    payload: NotificationPayloads[K],
  ): Promise<NotificationResult> {
    try {
      const rendered = RENDERERS[kind](payload);
      const result = await this.emailService.send({ to: recipient, ...rendered });

      if (result.status === 'error') {
        return { kind, recipient, outcome: 'error', error: result.error };
      }
      return { kind, recipient, outcome: result.status };
    } catch (error) {
      const message = describeError(error);
      functions.logger.error(`[notifications] Failed to send ${kind} to ${recipient}`, {
        error: message,
      });
      return { kind, recipient, outcome: 'error', error: message };
    }
  }
}

export function summarizeDeliveries(results: NotificationResult[]): DeliveryReport {
  return results.reduce<DeliveryReport>(
    (report, result) => {
      report.attempted += 1;
      if (result.outcome === 'delivered') {
        report.delivered += 1;
      } else if (result.outcome === 'simulated') {
        report.simulated += 1;
      } else {
        report.failed += 1;
        report.failures.push({ recipient: result.recipient, error: result.error ?? 'unknown error' });
      }
      return report;
    },
    { attempted: 0, delivered: 0, simulated: 0, failed: 0, failures: [] },
  );
}

/**
 * Sends one notification per item and folds the outcomes into a report.
 */
export async function dispatchAll<K extends NotificationKind>(
  dispatcher: NotificationDispatcher,
  kind: K,
  items: Array<{ recipient: string; payload: NotificationPayloads[K] }>,
): Promise<DeliveryReport> {
  const results = await Promise.all(
    items.map((item) => dispatcher.notify(kind, item.recipient, item.payload)),
  );
  const report = summarizeDeliveries(results);

  if (report.attempted > 0) {
    functions.logger.info(`[notifications] ${kind}: ${report.delivered} delivered, ${report.simulated} simulated, ${report.failed} failed`);
  }
  return report;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the notification step that follows a committed write. A failure while
 * loading recipients or dispatching is logged and reported as a failed
 * delivery; the committed result stands.
 */
export async function notifyAfterCommit(
  label: string,
  step: () => Promise<DeliveryReport>,
): Promise<DeliveryReport> {
  try {
    return await step();
  } catch (error) {
    const message = describeError(error);
    functions.logger.error(`[notifications] ${label}: notification step failed`, { error: message });
    return {
      attempted: 0,
      delivered: 0,
      simulated: 0,
      failed: 1,
      failures: [{ recipient: null, error: message }],
    };
  }
}

/**
 * Single-recipient counterpart of `notifyAfterCommit`.
 */
export async function notifyOneAfterCommit(
  kind: NotificationKind,
  recipient: string,
  step: () => Promise<NotificationResult | null>,
): Promise<NotificationResult | null> {
  try {
    return await step();
  } catch (error) {
    const message = describeError(error);
    functions.logger.error(`[notifications] ${kind} to ${recipient}: notification step failed`, {
      error: message,
    });
    return { kind, recipient, outcome: 'error', error: message };
  }
}
