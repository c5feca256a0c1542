/**
 * Classification facade.
 */
export {
  classifyRisk, isEmploymentUseCase,
  EMPLOYMENT_USE_CASES, HIGH_RISK_OBLIGATIONS, HIGH_RISK_DEADLINE, TRANSPARENCY_DEADLINE,
  PROHIBITED_PENALTY, STANDARD_PENALTY,
} from './risk.js';
export { determineRoles, isEuLocation, isProvider, isImporter } from './roles.js';
export { checkProhibitedPractices, PROHIBITED_PRACTICES } from './prohibited.js';
