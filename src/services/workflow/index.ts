// =============================================================================
// GAZETTE - Article Workflow Services
// =============================================================================

export { TRANSITIONS, canTransition, submit, approve, reject, edit } from './state-machine';

export {
  loadArticleScope,
  createArticle,
  submitArticle,
  approveArticle,
  rejectArticle,
  editArticle,
  viewArticle,
} from './articles';
