/**
 * Direction Classifier
 * Labels a message INCOMING when it was addressed to the monitored inbox,
 * OUTGOING otherwise.
 *
 * Address fields are checked first (to, cc, bcc). Forwarded mail often
 * loses the inbox address, so the gateway's external-sender banner is used
 * as a fallback signal. Heuristic: an outgoing reply quoting a banner near
 * the top of the body will read as INCOMING.
 */

import { hasExternalWarningBanner } from '../cleaning/BannerStripper';
import { formatRecipientList } from './addresses';
import { EmailDirection, MailContainer } from './types';

export interface DirectionClassifierOptions {
  inboxAddress: string;
  bannerScanChars?: number;
}

type RecipientFields = Pick<MailContainer, 'to' | 'cc' | 'bcc'>;

export class DirectionClassifier {
  private readonly inboxAddress: string;
  private readonly bannerScanChars: number;

  constructor(options: DirectionClassifierOptions) {
    this.inboxAddress = options.inboxAddress.toLowerCase();
    this.bannerScanChars = options.bannerScanChars ?? 400;
  }

  /**
   * @param body - plain text body, or a thunk read only when no address matches
   */
  classify(recipients: RecipientFields, body: string | (() => string)): EmailDirection {
    if (
      this.fieldContainsInbox(recipients.to) ||
      this.fieldContainsInbox(recipients.cc) ||
      this.fieldContainsInbox(recipients.bcc)
    ) {
      return 'INCOMING';
    }

    const text = typeof body === 'function' ? body() : body;
    if (hasExternalWarningBanner(text, this.bannerScanChars)) {
      return 'INCOMING';
    }

    return 'OUTGOING';
  }

  fieldContainsInbox(field: string | null | undefined): boolean {
    if (!field) {
      return false;
    }
    return formatRecipientList(field).toLowerCase().includes(this.inboxAddress);
  }
}
