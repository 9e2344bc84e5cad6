// =============================================================================
// GAZETTE - Outbound Mail
//
// Transport is deployment-specific. The default mailer only logs, which is
// what development and tests want.
// =============================================================================

import { log } from '../../utils/log';

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
}

export interface IMailer {
  send(message: MailMessage): Promise<void>;
}

export class ConsoleMailer implements IMailer {
  async send(message: MailMessage): Promise<void> {
    log.info('Mail', `To ${message.to}: ${message.subject}`);
    log.debug('Mail', message.text);
  }
}
