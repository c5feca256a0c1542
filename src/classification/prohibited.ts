/**
 * Article 5(1)(a) to (h) prohibited-practice checks.
 *
 * Every check runs; violations accumulate in article order.
 */

import { PROHIBITED_PENALTY } from './risk.js';
import type { ProhibitedPracticeFlags, ProhibitedPracticesResult, Violation } from '../types/index.js';

interface PracticeRule {
  flag: keyof ProhibitedPracticeFlags;
  article: string;
  violation: string;
  description: string;
  exception: string;
}

export const PROHIBITED_PRACTICES: readonly PracticeRule[] = [
  {
    flag: 'uses_subliminal_techniques',
    article: 'Article 5(1)(a)',
    violation: 'Subliminal techniques to manipulate behavior',
    description: "AI systems that deploy subliminal techniques beyond a person's consciousness to materially distort behavior",
    exception: 'None',
  },
  {
    flag: 'exploits_vulnerabilities',
    article: 'Article 5(1)(b)',
    violation: 'Exploitation of vulnerabilities',
    description: 'AI systems that exploit vulnerabilities of specific groups (age, disability, social/economic situation)',
    exception: 'None',
  },
  {
    flag: 'social_scoring',
    article: 'Article 5(1)(c)',
    violation: 'Social scoring',
    description: 'AI systems for social scoring by public authorities or on their behalf',
    exception: 'None',
  },
  {
    flag: 'predicts_crime_from_profiling',
    article: 'Article 5(1)(d)',
    violation: 'Predictive policing based on profiling',
    description: 'AI systems that make risk assessments of natural persons to predict criminal offenses based solely on profiling',
    exception: 'None',
  },
  {
    flag: 'scrapes_facial_images',
    article: 'Article 5(1)(e)',
    violation: 'Untargeted scraping of facial images',
    description: 'Creating or expanding facial recognition databases through untargeted scraping from internet or CCTV',
    exception: 'None',
  },
  {
    flag: 'detects_emotions_in_workplace',
    article: 'Article 5(1)(f)',
    violation: 'Emotion recognition in workplace or education',
    description: 'AI systems that infer emotions in workplace or educational institutions',
    exception: 'Medical or safety reasons only',
  },
  {
    flag: 'biometric_categorization_sensitive_attributes',
    article: 'Article 5(1)(g)',
    violation: 'Biometric categorization of sensitive attributes',
    description: 'Biometric categorization systems that infer race, political opinions, trade union membership, religious/philosophical beliefs, sex life, or sexual orientation',
    exception: 'Limited exceptions for law enforcement with safeguards',
  },
  {
    flag: 'real_time_biometric_identification_public',
    article: 'Article 5(1)(h)',
    violation: 'Real-time remote biometric identification in public',
    description: 'Real-time remote biometric identification systems in publicly accessible spaces for law enforcement',
    exception: 'Very limited exceptions for serious crimes with judicial authorization',
  },
];

export function checkProhibitedPractices(flags: ProhibitedPracticeFlags): ProhibitedPracticesResult {
  const violations: Violation[] = [];
  for (const rule of PROHIBITED_PRACTICES) {
    if (flags[rule.flag] !== true) continue;
    violations.push({
      article: rule.article,
      violation: rule.violation,
      description: rule.description,
      penalty: PROHIBITED_PENALTY,
      exception: rule.exception,
    });
  }

  if (violations.length === 0) {
    return {
      is_prohibited: false,
      severity: 'None',
      violations: [],
      violation_count: 0,
      recommendation: 'No prohibited practices detected',
      compliance_status: 'COMPLIANT with Article 5 prohibitions',
      next_steps: [
        'Continue to check high-risk and limited-risk classifications',
        'Monitor for regulatory updates',
        'Maintain compliance documentation',
      ],
    };
  }

  return {
    is_prohibited: true,
    severity: 'CRITICAL',
    violations,
    violation_count: violations.length,
    total_penalty_exposure: 'Up to €35 million or 7% of global annual turnover PER violation',
    recommendation: 'STOP IMMEDIATELY - These AI practices are PROHIBITED under EU AI Act',
    required_actions: [
      'Cease development and deployment immediately',
      'Notify relevant supervisory authorities',
      'Assess alternatives that comply with EU AI Act',
      'Consult legal counsel for remediation strategy',
    ],
    compliance_status: 'NON-COMPLIANT - Critical violation',
  };
}
