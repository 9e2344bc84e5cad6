// =============================================================================
// GAZETTE - Application Wiring
// =============================================================================

import { IMailer } from '../services/password-reset/mailer';
import { IPublishingStore } from './store';

/** Collaborators handed to the Express app and its routers. */
export interface AppDependencies {
  store: IPublishingStore;
  mailer: IMailer;
  /** Resolves when the database answers; rejects otherwise. */
  checkDatabase: () => Promise<void>;
}
