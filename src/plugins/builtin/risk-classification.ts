/**
 * Risk classification and Article 5 screening.
 */

import { z } from 'zod';
import { BasePlugin } from '../base.js';
import { defineTool, type ToolDefinition, type ResourceDefinition } from '../types.js';
import { classifyRisk, checkProhibitedPractices } from '../../classification/index.js';
import type { TemplateStore } from '../../templates/index.js';

const flag = (description: string) => z.boolean().default(false).describe(description);

export class RiskClassificationPlugin extends BasePlugin {
  readonly name = 'RiskClassificationPlugin';
  readonly description = 'Classifies AI systems by EU AI Act risk level and checks Article 5 prohibited practices';

  constructor(private readonly templates: TemplateStore) {
    super();
  }

  getTools(): ToolDefinition[] {
    return [
      defineTool({
        name: 'classify_ai_system_risk',
        description: 'Classify an AI system under the EU AI Act as PROHIBITED, HIGH-RISK, LIMITED-RISK or MINIMAL-RISK. The first matching tier wins.',
        input: {
          system_description: z.string().describe('What the AI system does'),
          use_case: z.string().describe('Primary use case, e.g. "employment", "chatbot"'),
          biometric_data: flag('Processes biometric data for identification or categorization'),
          critical_infrastructure: flag('Used in critical infrastructure'),
          education: flag('Used in education or vocational training'),
          law_enforcement: flag('Used for law enforcement'),
          predicts_criminal_behavior: flag('Predicts criminal behavior from profiling'),
          social_scoring: flag('Performs social scoring'),
          emotion_detection_workplace: flag('Detects emotions in the workplace or education'),
          generates_content: flag('Generates synthetic audio, image, video or text'),
          interacts_with_users: flag('Interacts directly with natural persons'),
        },
        run: (args) => classifyRisk(args),
      }),
      defineTool({
        name: 'check_prohibited_practices',
        description: 'Check an AI system against all eight Article 5 prohibited practices. Every violation is reported.',
        input: {
          uses_subliminal_techniques: flag('Deploys subliminal techniques to distort behavior'),
          exploits_vulnerabilities: flag('Exploits vulnerabilities of specific groups'),
          social_scoring: flag('Social scoring by or for public authorities'),
          predicts_crime_from_profiling: flag('Predicts criminal offenses solely from profiling'),
          scrapes_facial_images: flag('Untargeted scraping of facial images'),
          detects_emotions_in_workplace: flag('Infers emotions in workplace or education'),
          biometric_categorization_sensitive_attributes: flag('Infers sensitive attributes from biometrics'),
          real_time_biometric_identification_public: flag('Real-time remote biometric identification in public spaces'),
        },
        run: (args) => checkProhibitedPractices(args),
      }),
    ];
  }

  getResources(): ResourceDefinition[] {
    return [{
      uri: 'article50-rules://official-text',
      name: 'article50-rules',
      description: 'Article 50 transparency obligations, penalties and key definitions',
      mimeType: 'application/json',
      read: () => this.templates.rawText('article50_rules'),
    }];
  }
}
