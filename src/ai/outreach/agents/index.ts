export { runWriter, type WriterDeps, type WriterOutput } from './writer';
export { runRefiner, type RefinerDeps, type RefinerOutput } from './refiner';
export { composeReviewFeedback, runReviewer, type ReviewerDeps, type ReviewerOutput } from './reviewer';
