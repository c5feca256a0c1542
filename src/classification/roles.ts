/**
 * Article 3 operator roles.
 *
 * Roles are not mutually exclusive. Predicates are evaluated in a fixed order
 * and the first role found is reported as primary.
 */

import type { RoleInput, RoleSet, RoleName, RoleKey, RoleDetail, NoRoleIdentified } from '../types/index.js';

const EU_REGION_NAMES: readonly string[] = ['eu', 'european union'];

const EU_COUNTRY_NAMES: readonly string[] = [
  'germany', 'france', 'spain', 'italy', 'netherlands',
  'belgium', 'austria', 'ireland', 'portugal', 'greece',
];

const PROVIDER_PENALTY = 'Up to €15M or 3% of global turnover for non-compliance';

/** Approximation by name, not a geo lookup. */
export function isEuLocation(location: string): boolean {
  const lower = location.toLowerCase();
  return EU_REGION_NAMES.includes(lower) || EU_COUNTRY_NAMES.some((c) => lower.includes(c));
}

interface RoleContext {
  input: RoleInput;
  is_in_eu: boolean;
  is_provider: boolean;
  is_importer: boolean;
}

interface RoleRule {
  role: RoleName;
  key: RoleKey;
  applies: (ctx: RoleContext) => boolean;
  detail: (ctx: RoleContext) => RoleDetail;
}

export function isProvider(i: RoleInput): boolean {
  return Boolean(
    i.develops_ai_system
    || (i.sells_ai_system && i.under_own_name_or_trademark)
    || i.substantial_modification
    || i.change_intended_purpose,
  );
}

export function isImporter(i: RoleInput, isInEu: boolean): boolean {
  return Boolean(
    !isInEu
    && i.imports_to_eu
    && (i.sells_ai_system || i.distributes_in_eu)
    && i.under_own_name_or_trademark,
  );
}

const ROLE_CHECKS: RoleRule[] = [
  {
    role: 'PROVIDER',
    key: 'provider',
    applies: (ctx) => ctx.is_provider,
    detail: ({ input }) => ({
      article: 'Article 3(3)',
      definition: 'Develops the AI system or has it developed, and places it on the market or puts it into service under own name or trademark',
      applies_to_you: true,
      reason: `You ${providerReasons(input).join(' and ')}`,
      key_obligations: [
        'Establish risk management system (Article 9)',
        'Data governance and quality (Article 10)',
        'Technical documentation (Article 11)',
        'Automatic logging (Article 12)',
        'Design for human oversight (Article 14)',
        'Accuracy and robustness (Article 15)',
        'Cybersecurity measures (Article 15)',
        'Quality management system (Article 17)',
        'Conformity assessment (Article 43)',
        'CE marking (Article 48)',
        'EU database registration (Article 49)',
      ],
      deadline: '2027-08-02 (for high-risk systems)',
      penalties: PROVIDER_PENALTY,
    }),
  },
  {
    role: 'DEPLOYER',
    key: 'deployer',
    applies: ({ input }) => input.uses_ai_system === true,
    detail: () => ({
      article: 'Article 3(4)',
      definition: 'Uses an AI system under their authority, except for personal non-professional activity',
      applies_to_you: true,
      reason: 'You use AI systems in your operations',
      key_obligations: [
        'Use AI according to instructions (Article 26(1))',
        'Ensure human oversight (Article 26(2))',
        'Monitor AI system operation (Article 26(3))',
        'Report serious incidents (Article 26(4))',
        'Keep logs generated by AI system (Article 26(5))',
        'Conduct fundamental rights impact assessment (Article 27)',
        'Inform workers about AI monitoring systems (Article 26(7))',
        'Ensure input data quality (Article 26(6))',
      ],
      deadline: '2027-08-02 (for high-risk systems)',
      penalties: PROVIDER_PENALTY,
    }),
  },
  {
    role: 'IMPORTER',
    key: 'importer',
    applies: (ctx) => ctx.is_importer,
    detail: ({ input }) => ({
      article: 'Article 3(5)',
      definition: 'Places on the market an AI system that bears the name or trademark of a person established outside the EU',
      applies_to_you: true,
      reason: `You are based in ${input.company_location} and import AI systems to EU market`,
      key_obligations: [
        "Verify provider's conformity assessment (Article 23(1))",
        'Verify CE marking and documentation (Article 23(2))',
        'Ensure registration in EU database (Article 23(3))',
        'Keep copy of technical documentation (Article 23(4))',
        'Provide authorities with documentation (Article 23(5))',
        "Ensure storage/transport doesn't affect compliance (Article 23(6))",
        'Appoint authorized representative in EU (Article 22)',
      ],
      deadline: '2027-08-02',
      penalties: PROVIDER_PENALTY,
    }),
  },
  {
    role: 'DISTRIBUTOR',
    key: 'distributor',
    applies: ({ input, is_provider, is_importer }) =>
      input.distributes_in_eu === true && !is_provider && !is_importer && input.sells_ai_system === true,
    detail: () => ({
      article: 'Article 3(6)',
      definition: 'Makes an AI system available on the market without being the provider or importer',
      applies_to_you: true,
      reason: 'You distribute AI systems in the EU market',
      key_obligations: [
        'Verify CE marking present (Article 24(1))',
        'Verify required documentation provided (Article 24(2))',
        'Verify provider/importer obligations met (Article 24(3))',
        'Inform provider/importer of non-compliance (Article 24(4))',
        'Cooperate with authorities (Article 24(5))',
      ],
      deadline: '2027-08-02',
      penalties: PROVIDER_PENALTY,
    }),
  },
  {
    role: 'AUTHORIZED REPRESENTATIVE',
    key: 'authorized_representative',
    applies: ({ input, is_in_eu }) => is_in_eu && input.represents_non_eu_provider === true,
    detail: ({ input }) => ({
      article: 'Article 3(7)',
      definition: 'Natural or legal person located in the EU who has received a written mandate from a provider outside the EU',
      applies_to_you: true,
      reason: `You are based in ${input.company_location} (EU) and represent a non-EU AI provider`,
      key_obligations: [
        'Perform tasks specified in mandate (Article 22(1))',
        'Provide copy of technical documentation to authorities (Article 22(2))',
        'Cooperate with authorities (Article 22(3))',
        'Terminate mandate if provider non-compliant (Article 22(4))',
      ],
      deadline: '2027-08-02',
      penalties: "Provider's penalties may apply",
    }),
  },
  {
    role: 'PRODUCT MANUFACTURER',
    key: 'product_manufacturer',
    applies: ({ input }) => input.integrates_ai_into_product === true && input.under_own_name_or_trademark === true,
    detail: () => ({
      article: 'Article 3(8) + Article 25',
      definition: 'Manufactures a product and integrates an AI system into it, where the AI is a safety component or the product itself',
      applies_to_you: true,
      reason: 'You integrate AI systems into physical products under your name/trademark',
      key_obligations: [
        'Assume provider obligations for AI component (Article 25(1))',
        'Ensure AI system complies with requirements (Article 25(2))',
        'Affix own name/trademark to product (Article 25(3))',
        'Follow relevant product safety legislation',
        'Conduct conformity assessment for AI component',
      ],
      deadline: '2027-08-02',
      penalties: 'Provider penalties apply (up to €15M or 3% of turnover)',
    }),
  },
];

/**
 * Determine which roles apply. Total and pure.
 */
export function determineRoles(input: RoleInput): RoleSet {
  const isInEu = isEuLocation(input.company_location);
  const ctx: RoleContext = {
    input,
    is_in_eu: isInEu,
    is_provider: isProvider(input),
    is_importer: isImporter(input, isInEu),
  };

  const matched = ROLE_CHECKS.filter((check) => check.applies(ctx));
  if (matched.length === 0) return noRole(input, isInEu);

  const roles = matched.map((m) => m.role);
  const details: Partial<Record<RoleKey, RoleDetail>> = {};
  for (const m of matched) details[m.key] = m.detail(ctx);

  const [primary, ...additional] = roles;
  return {
    kind: 'roles',
    primary_role: primary,
    additional_roles: additional,
    all_roles: roles,
    role_details: details,
    company_description: input.company_description,
    company_location: input.company_location,
    is_eu_based: isInEu,
    total_roles: roles.length,
    critical_note: 'If you have multiple roles, you must comply with ALL obligations for each role',
    recommendation: `Focus first on ${primary} obligations, then address ${additional.length > 0 ? additional.join(', ') : 'other compliance areas'}`,
    next_steps: [
      `Review all ${primary} obligations in detail`,
      'Determine which AI systems are high-risk vs limited-risk',
      'Create compliance timeline based on deadlines',
      'Assign responsibility for each obligation',
      'Consider consulting legal counsel for complex cases',
    ],
  };
}

function providerReasons(i: RoleInput): string[] {
  const parts: string[] = [];
  if (i.develops_ai_system) parts.push('develop AI systems');
  if (i.sells_ai_system && i.under_own_name_or_trademark) parts.push('place AI on the market under your own name/trademark');
  if (i.substantial_modification) parts.push('substantially modify AI systems');
  if (i.change_intended_purpose) parts.push('change the intended purpose of AI systems');
  return parts;
}

function noRole(input: RoleInput, isInEu: boolean): NoRoleIdentified {
  return {
    kind: 'no_role',
    primary_role: 'NO DIRECT ROLE',
    additional_roles: [],
    role_details: {},
    company_description: input.company_description,
    company_location: input.company_location,
    is_eu_based: isInEu,
    assessment: 'Based on provided information, you may not have direct EU AI Act obligations',
    recommendation: 'If you interact with AI systems in any way, review the questions again. You may be a deployer if you use AI systems.',
    next_steps: [
      'Verify you are not using AI systems in your operations',
      'If you are using AI, you are likely a DEPLOYER',
      'Monitor for regulatory changes that may affect your activities',
    ],
  };
}
