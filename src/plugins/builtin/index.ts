/**
 * Built-in plugin manifest. Entries load in this order.
 */

import type { PluginManifest } from '../loader.js';
import { RiskClassificationPlugin } from './risk-classification.js';
import { RoleDeterminationPlugin } from './role-determination.js';
import { TransparencyPlugin } from './transparency.js';
import { DeepfakePlugin } from './deepfake.js';
import { WatermarkingPlugin } from './watermarking.js';
import { SecurityPlugin } from './security.js';

export const BUILTIN_PLUGINS: PluginManifest = {
  'risk-classification': (ctx) => new RiskClassificationPlugin(ctx.templates),
  'role-determination': () => new RoleDeterminationPlugin(),
  'transparency': (ctx) => new TransparencyPlugin(ctx.templates),
  'deepfake': (ctx) => new DeepfakePlugin(ctx.templates),
  'watermarking': (ctx) => new WatermarkingPlugin(ctx.templates),
  'security': (ctx) => new SecurityPlugin(ctx.scoring),
};

export {
  RiskClassificationPlugin, RoleDeterminationPlugin, TransparencyPlugin,
  DeepfakePlugin, WatermarkingPlugin, SecurityPlugin,
};
