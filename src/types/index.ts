/**
 * Core type definitions for the EU AI Act compliance server.
 *
 * Organized into: Classification, Roles, Prohibited practices, Transparency,
 * Security, Config. Field names follow the wire format of the tool results.
 */

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export type RiskLevel = 'PROHIBITED' | 'HIGH-RISK' | 'LIMITED-RISK' | 'MINIMAL-RISK';

export type RoleName =
  | 'PROVIDER' | 'DEPLOYER' | 'IMPORTER' | 'DISTRIBUTOR'
  | 'AUTHORIZED REPRESENTATIVE' | 'PRODUCT MANUFACTURER';

export type RoleKey =
  | 'provider' | 'deployer' | 'importer' | 'distributor'
  | 'authorized_representative' | 'product_manufacturer';

export type ContentType = 'text' | 'image' | 'video' | 'audio';

export type DisclosureType = 'ai_interaction' | 'emotion_recognition';

export type ThreatLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type SensitivityLevel = 'LOW' | 'SENSITIVE' | 'CONFIDENTIAL' | 'HIGHLY_CONFIDENTIAL';

// ---------------------------------------------------------------------------
// Shared results
// ---------------------------------------------------------------------------

/** Recoverable user error: returned, never thrown, so callers can self-correct. */
export interface UserErrorResult {
  error: string;
  [option: string]: unknown;
}

// ---------------------------------------------------------------------------
// Risk classification (Articles 5, 6, 50 + Annex III)
// ---------------------------------------------------------------------------

export interface ClassificationInput {
  system_description: string;
  use_case: string;
  biometric_data?: boolean;
  critical_infrastructure?: boolean;
  education?: boolean;
  law_enforcement?: boolean;
  predicts_criminal_behavior?: boolean;
  social_scoring?: boolean;
  emotion_detection_workplace?: boolean;
  generates_content?: boolean;
  interacts_with_users?: boolean;
}

export interface ProhibitedClassification {
  risk_level: 'PROHIBITED';
  article: string;
  reason: string;
  system_description: string;
  compliance_action: string;
  exception?: string;
  penalties: string;
  deadline: string;
  recommendation: string;
}

export interface HighRiskClassification {
  risk_level: 'HIGH-RISK';
  article: string;
  annex_reference: string;
  reason: string;
  system_description: string;
  all_high_risk_factors: string[];
  applicable_obligations: string[];
  compliance_deadline: string;
  penalties_if_non_compliant: string;
  next_steps: string[];
}

export interface LimitedRiskClassification {
  risk_level: 'LIMITED-RISK';
  article: string;
  reason: string;
  system_description: string;
  applicable_obligations: string[];
  compliance_deadline: string;
  penalties_if_non_compliant: string;
  next_steps: string[];
}

export interface MinimalRiskClassification {
  risk_level: 'MINIMAL-RISK';
  article: string;
  reason: string;
  system_description: string;
  applicable_obligations: string[];
  compliance_deadline: string;
  penalties_if_non_compliant: string;
  next_steps: string[];
}

export type ClassificationResult =
  | ProhibitedClassification
  | HighRiskClassification
  | LimitedRiskClassification
  | MinimalRiskClassification;

// ---------------------------------------------------------------------------
// Role determination (Article 3)
// ---------------------------------------------------------------------------

export interface RoleInput {
  company_description: string;
  company_location: string;
  develops_ai_system?: boolean;
  uses_ai_system?: boolean;
  sells_ai_system?: boolean;
  imports_to_eu?: boolean;
  distributes_in_eu?: boolean;
  integrates_ai_into_product?: boolean;
  represents_non_eu_provider?: boolean;
  under_own_name_or_trademark?: boolean;
  substantial_modification?: boolean;
  change_intended_purpose?: boolean;
}

export interface RoleDetail {
  article: string;
  definition: string;
  applies_to_you: true;
  reason: string;
  key_obligations: string[];
  deadline: string;
  penalties: string;
}

export interface RolesIdentified {
  kind: 'roles';
  primary_role: RoleName;
  additional_roles: RoleName[];
  all_roles: RoleName[];
  role_details: Partial<Record<RoleKey, RoleDetail>>;
  company_description: string;
  company_location: string;
  is_eu_based: boolean;
  total_roles: number;
  critical_note: string;
  recommendation: string;
  next_steps: string[];
}

export interface NoRoleIdentified {
  kind: 'no_role';
  primary_role: 'NO DIRECT ROLE';
  additional_roles: [];
  role_details: Record<string, never>;
  company_description: string;
  company_location: string;
  is_eu_based: boolean;
  assessment: string;
  recommendation: string;
  next_steps: string[];
}

export type RoleSet = RolesIdentified | NoRoleIdentified;

// ---------------------------------------------------------------------------
// Prohibited practices (Article 5)
// ---------------------------------------------------------------------------

export interface ProhibitedPracticeFlags {
  uses_subliminal_techniques?: boolean;
  exploits_vulnerabilities?: boolean;
  social_scoring?: boolean;
  predicts_crime_from_profiling?: boolean;
  scrapes_facial_images?: boolean;
  detects_emotions_in_workplace?: boolean;
  biometric_categorization_sensitive_attributes?: boolean;
  real_time_biometric_identification_public?: boolean;
}

export interface Violation {
  article: string;
  violation: string;
  description: string;
  penalty: string;
  exception: string;
}

export interface ProhibitedPracticesResult {
  is_prohibited: boolean;
  severity: 'CRITICAL' | 'None';
  violations: Violation[];
  violation_count: number;
  recommendation: string;
  compliance_status: string;
  total_penalty_exposure?: string;
  required_actions?: string[];
  next_steps?: string[];
}

// ---------------------------------------------------------------------------
// Security (Article 15)
// ---------------------------------------------------------------------------

export interface AnalysisItem {
  type: string;
  name?: string;
  result?: unknown;
}

export interface AnalysisResponse {
  analysis: AnalysisItem[];
  tag?: string | null;
}

export interface ScoredInjection {
  is_prompt_injection: boolean;
  confidence: number;
  attack_type: 'none' | 'instruction_override' | 'long_form_injection';
  risk_level: ThreatLevel;
  recommendation: string;
  scores: { basic_injection: number; long_form_injection: number };
  eu_ai_act_relevance: string;
  article_15_compliance: string;
  analysis: { detection_method: string; api_endpoint: string; tag: string };
  next_steps: string[];
}

/** No verdict. Distinct from a verdict that says the input is safe. */
export interface UnverifiedInjection {
  error: string;
  details: string;
  is_prompt_injection: null;
  recommendation: string;
  eu_ai_act_relevance: string;
  fallback_suggestion: string;
}

export type ScoreRecord = ScoredInjection | UnverifiedInjection;

export type FileAccessAction = 'BLOCK' | 'REQUIRE_AUTH' | 'ALLOW';

export interface SensitivePath {
  path?: string;
  confidence?: number;
  category?: string;
}

export interface FileAccessAssessment {
  is_sensitive: boolean;
  sensitivity_level: SensitivityLevel;
  detected_paths: SensitivePath[];
  detected_data_types: string[];
  file_path: string;
  agent_action: string;
  recommendation: string;
  action: FileAccessAction;
  eu_ai_act_relevance: string;
  article_10_compliance: string;
  article_15_compliance: string;
  access_control_recommendation: string;
  analysis: { detection_method: string; api_endpoint: string; tag: string };
  security_measures: string[];
  compliance_actions: string[];
}

/** Could not check: access is denied by default. */
export interface FileAccessUnverified {
  error: string;
  details: string;
  is_sensitive: null;
  recommendation: string;
  action: 'DENY_SAFE';
  eu_ai_act_relevance: string;
}

export type FileAccessRecord = FileAccessAssessment | FileAccessUnverified;

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface ComplianceConfig {
  resources_path: string;
  scoring: {
    base_url: string;
    api_token: string | null;
    analysis_id: string | null;
    timeout_ms: number;
  };
  proxy: {
    /** REST scoring API the proxy tries first; null skips it. */
    local_api_url: string | null;
    threshold: number;
    block_injections: boolean;
    block_unverified: boolean;
  };
  api: {
    host: string;
    port: number;
  };
  plugins: {
    disabled: string[];
  };
}
