export { EVALUATORS, evaluateEntity, runChecks, verifyEntity } from './verify.js';
export {
  checkBusinessName,
  checkEntityAge,
  checkJurisdiction,
  checkRegistrationStatus,
  checkSanctions,
} from './rules.js';
export { aggregateChecks, buildVerdict } from './aggregate.js';
export type { AggregateResult } from './aggregate.js';
export { normalizeEntityPayload } from './validate.js';
export { formatVerdictSummary, tallyVerdict, titleCase } from './summary.js';
export type { VerdictTally } from './summary.js';
