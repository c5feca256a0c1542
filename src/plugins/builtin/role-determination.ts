import { z } from 'zod';
import { BasePlugin } from '../base.js';
import { defineTool, type ToolDefinition } from '../types.js';
import { determineRoles } from '../../classification/index.js';

const flag = (description: string) => z.boolean().default(false).describe(description);

/** Article 3 operator roles. Roles are cumulative. */
export class RoleDeterminationPlugin extends BasePlugin {
  readonly name = 'RoleDeterminationPlugin';
  readonly description = 'Determines EU AI Act operator roles (provider, deployer, importer, distributor, ...)';

  getTools(): ToolDefinition[] {
    return [
      defineTool({
        name: 'determine_eu_ai_act_role',
        description: 'Determine which EU AI Act roles an organization holds. Roles are not mutually exclusive; the first identified is primary.',
        input: {
          company_description: z.string().describe('What the organization does'),
          company_location: z.string().describe('Country or region where the organization is established'),
          develops_ai_system: flag('Develops AI systems'),
          uses_ai_system: flag('Uses AI systems under its authority'),
          sells_ai_system: flag('Sells or places AI systems on the market'),
          imports_to_eu: flag('Imports AI systems into the EU'),
          distributes_in_eu: flag('Distributes AI systems in the EU'),
          integrates_ai_into_product: flag('Integrates AI into its own products'),
          represents_non_eu_provider: flag('Holds a mandate from a non-EU provider'),
          under_own_name_or_trademark: flag('Markets under its own name or trademark'),
          substantial_modification: flag('Substantially modifies AI systems'),
          change_intended_purpose: flag('Changes the intended purpose of AI systems'),
        },
        run: (args) => determineRoles(args),
      }),
    ];
  }
}
