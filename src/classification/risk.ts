/**
 * Risk Classifier (Articles 5, 6, 50 and Annex III).
 *
 * Maps a system description to exactly one risk level. Checks run in a fixed
 * order and the first tier that matches is terminal:
 *   PROHIBITED → HIGH-RISK → LIMITED-RISK → MINIMAL-RISK
 *
 * Only three Article 5 practices are checked here. The full set of eight lives
 * in ./prohibited.ts and reports every violation instead of the first.
 */

import type {
  ClassificationInput,
  ClassificationResult,
  ProhibitedClassification,
  HighRiskClassification,
  LimitedRiskClassification,
  MinimalRiskClassification,
} from '../types/index.js';

export const PROHIBITED_PENALTY = 'Up to €35 million or 7% of global annual turnover (whichever is higher)';
export const STANDARD_PENALTY = 'Up to €15 million or 3% of global annual turnover';
export const HIGH_RISK_DEADLINE = '2027-08-02';
export const TRANSPARENCY_DEADLINE = '2026-08-02';

export const EMPLOYMENT_USE_CASES: readonly string[] = ['employment', 'hiring', 'hr', 'recruitment'];

interface ProhibitedRule {
  flag: keyof ClassificationInput;
  article: string;
  reason: string;
  exception?: string;
  recommendation: string;
}

const PROHIBITED_RULES: ProhibitedRule[] = [
  {
    flag: 'social_scoring',
    article: 'Article 5(1)(c)',
    reason: 'Social scoring by public authorities or on their behalf',
    recommendation: 'Discontinue development or deployment immediately',
  },
  {
    flag: 'emotion_detection_workplace',
    article: 'Article 5(1)(f)',
    reason: 'Emotion recognition in workplace or education (except medical/safety)',
    exception: 'Allowed only for medical or safety reasons',
    recommendation: 'Remove emotion detection or limit to medical/safety contexts',
  },
  {
    flag: 'predicts_criminal_behavior',
    article: 'Article 5(1)(d)',
    reason: 'Risk assessment predicting criminal offenses based on profiling',
    recommendation: 'Discontinue predictive profiling features',
  },
];

interface HighRiskRule {
  applies: (input: ClassificationInput) => boolean;
  reason: string;
  annex_point: string;
}

const HIGH_RISK_RULES: HighRiskRule[] = [
  {
    applies: (i) => i.biometric_data === true,
    reason: 'Biometric identification or categorization',
    annex_point: 'Annex III point 1',
  },
  {
    applies: (i) => isEmploymentUseCase(i.use_case),
    reason: 'AI system for employment, recruitment, or HR decisions',
    annex_point: 'Annex III point 4(a)',
  },
  {
    applies: (i) => i.education === true,
    reason: 'AI system for education or vocational training',
    annex_point: 'Annex III point 3',
  },
  {
    applies: (i) => i.law_enforcement === true,
    reason: 'AI system for law enforcement',
    annex_point: 'Annex III point 6',
  },
  {
    applies: (i) => i.critical_infrastructure === true,
    reason: 'AI system for critical infrastructure',
    annex_point: 'Annex III point 2',
  },
];

export const HIGH_RISK_OBLIGATIONS: readonly string[] = [
  'Risk management system (Article 9)',
  'Data governance and management (Article 10)',
  'Technical documentation (Article 11)',
  'Record-keeping/logging (Article 12)',
  'Transparency and information to users (Article 13)',
  'Human oversight (Article 14)',
  'Accuracy, robustness, cybersecurity (Article 15)',
  'Quality management system (Article 17)',
  'Conformity assessment (Article 43)',
  'Registration in EU database (Article 49)',
  'Post-market monitoring (Article 72)',
];

interface LimitedRiskRule {
  applies: (input: ClassificationInput) => boolean;
  reason: string;
  obligation: string;
}

const LIMITED_RISK_RULES: LimitedRiskRule[] = [
  {
    applies: (i) => i.interacts_with_users === true,
    reason: 'AI system interacts with natural persons',
    obligation: 'Must disclose AI interaction to users',
  },
  {
    applies: (i) => i.generates_content === true,
    reason: 'Generates synthetic audio, image, video, or text content',
    obligation: 'Must watermark AI-generated content',
  },
];

/**
 * Classify an AI system. Total and pure: never throws on well-typed input.
 */
export function classifyRisk(input: ClassificationInput): ClassificationResult {
  return checkProhibited(input)
    ?? checkHighRisk(input)
    ?? checkLimitedRisk(input)
    ?? minimalRisk(input);
}

export function isEmploymentUseCase(useCase: string): boolean {
  return EMPLOYMENT_USE_CASES.includes(useCase.toLowerCase());
}

function checkProhibited(input: ClassificationInput): ProhibitedClassification | null {
  const rule = PROHIBITED_RULES.find((r) => input[r.flag] === true);
  if (!rule) return null;

  const result: ProhibitedClassification = {
    risk_level: 'PROHIBITED',
    article: rule.article,
    reason: rule.reason,
    system_description: input.system_description,
    compliance_action: 'MUST NOT deploy - System is prohibited',
    penalties: PROHIBITED_PENALTY,
    deadline: 'Immediate - Already in effect',
    recommendation: rule.recommendation,
  };
  if (rule.exception) result.exception = rule.exception;
  return result;
}

function checkHighRisk(input: ClassificationInput): HighRiskClassification | null {
  const matches = HIGH_RISK_RULES.filter((r) => r.applies(input));
  if (matches.length === 0) return null;

  const primary = matches[0];
  return {
    risk_level: 'HIGH-RISK',
    article: 'Article 6(2)',
    annex_reference: primary.annex_point,
    reason: primary.reason,
    system_description: input.system_description,
    all_high_risk_factors: matches.map((m) => m.reason),
    applicable_obligations: [...HIGH_RISK_OBLIGATIONS],
    compliance_deadline: HIGH_RISK_DEADLINE,
    penalties_if_non_compliant: STANDARD_PENALTY,
    next_steps: [
      'Conduct conformity assessment',
      'Implement risk management system',
      'Create technical documentation',
      'Establish human oversight mechanisms',
      'Register in EU database before deployment',
    ],
  };
}

function checkLimitedRisk(input: ClassificationInput): LimitedRiskClassification | null {
  const matches = LIMITED_RISK_RULES.filter((r) => r.applies(input));
  if (matches.length === 0) return null;

  return {
    risk_level: 'LIMITED-RISK',
    article: 'Article 50',
    reason: matches.map((m) => m.reason).join('; '),
    system_description: input.system_description,
    applicable_obligations: matches.map((m) => m.obligation),
    compliance_deadline: TRANSPARENCY_DEADLINE,
    penalties_if_non_compliant: STANDARD_PENALTY,
    next_steps: [
      'Implement transparency disclosures (Article 50)',
      'Add watermarks if generating content (Article 50(2))',
      "Ensure users know they're interacting with AI (Article 50(1))",
    ],
  };
}

function minimalRisk(input: ClassificationInput): MinimalRiskClassification {
  return {
    risk_level: 'MINIMAL-RISK',
    article: 'No specific article applies',
    reason: 'System does not fall under prohibited, high-risk, or limited-risk categories',
    system_description: input.system_description,
    applicable_obligations: [
      'Voluntary codes of conduct (Article 95)',
      'General transparency best practices',
    ],
    compliance_deadline: 'No mandatory deadline',
    penalties_if_non_compliant: 'None (voluntary compliance)',
    next_steps: [
      'Consider voluntary transparency measures',
      'Follow industry best practices',
      'Monitor for regulatory updates',
    ],
  };
}
