// =============================================================================
// GAZETTE - Role & Membership Services
// =============================================================================

export {
  isReader,
  isJournalist,
  isEditor,
  isPublisher,
  isStaff,
  isOwnerOf,
  isEditorOf,
  isJournalistOf,
  addEditor,
  addJournalist,
  addMember,
} from './model';
export type { MembershipChange } from './model';

export { addTeamMember, getPublisherDashboard } from './team';
export type { TeamMemberOutcome, PublisherDashboard } from './team';
