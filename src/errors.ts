/**
 * Error hierarchy. Every error carries a machine-readable `code` so the
 * loader and the transports can switch on it without parsing messages.
 */

export class ComplianceError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ComplianceError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ---------------------------------------------------------------------------
// Plugin registry
// ---------------------------------------------------------------------------

export class DuplicatePluginError extends ComplianceError {
  readonly pluginName: string;

  constructor(pluginName: string) {
    super('DUPLICATE_PLUGIN', `Plugin '${pluginName}' is already registered`);
    this.name = 'DuplicatePluginError';
    this.pluginName = pluginName;
  }
}

export class DuplicateToolError extends ComplianceError {
  readonly toolName: string;
  readonly ownerPlugin: string;

  constructor(toolName: string, ownerPlugin: string) {
    super('DUPLICATE_TOOL', `Tool '${toolName}' is already registered by plugin '${ownerPlugin}'`);
    this.name = 'DuplicateToolError';
    this.toolName = toolName;
    this.ownerPlugin = ownerPlugin;
  }
}

export class DuplicateResourceError extends ComplianceError {
  readonly resourceUri: string;
  readonly ownerPlugin: string;

  constructor(resourceUri: string, ownerPlugin: string) {
    super('DUPLICATE_RESOURCE', `Resource '${resourceUri}' is already registered by plugin '${ownerPlugin}'`);
    this.name = 'DuplicateResourceError';
    this.resourceUri = resourceUri;
    this.ownerPlugin = ownerPlugin;
  }
}

export class PluginNotFoundError extends ComplianceError {
  readonly pluginName: string;

  constructor(pluginName: string) {
    super('PLUGIN_NOT_FOUND', `Plugin '${pluginName}' is not registered`);
    this.name = 'PluginNotFoundError';
    this.pluginName = pluginName;
  }
}

export class PluginInitializationError extends ComplianceError {
  readonly pluginName: string;

  constructor(pluginName: string, cause: unknown) {
    super('PLUGIN_INIT_FAILED', `Plugin '${pluginName}' failed to initialize: ${describeError(cause)}`, { cause });
    this.name = 'PluginInitializationError';
    this.pluginName = pluginName;
  }
}

export class PluginShutdownError extends ComplianceError {
  readonly pluginName: string;

  constructor(pluginName: string, cause: unknown) {
    super('PLUGIN_SHUTDOWN_FAILED', `Plugin '${pluginName}' failed to shut down: ${describeError(cause)}`, { cause });
    this.name = 'PluginShutdownError';
    this.pluginName = pluginName;
  }
}

export class PluginLoadError extends ComplianceError {
  readonly entry: string;

  constructor(entry: string, cause: unknown) {
    super('PLUGIN_LOAD_FAILED', `Failed to load plugin '${entry}': ${describeError(cause)}`, { cause });
    this.name = 'PluginLoadError';
    this.entry = entry;
  }
}

// ---------------------------------------------------------------------------
// Configuration, templates, security
// ---------------------------------------------------------------------------

export class InvalidConfigError extends ComplianceError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'InvalidConfigError';
  }
}

export class TemplateLoadError extends ComplianceError {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    super('TEMPLATE_LOAD_FAILED', `Could not load template file ${file}: ${describeError(cause)}`, { cause });
    this.name = 'TemplateLoadError';
    this.file = file;
  }
}

export class ScoringUnavailableError extends ComplianceError {
  constructor(message: string) {
    super('SCORING_UNAVAILABLE', message);
    this.name = 'ScoringUnavailableError';
  }
}

export class ScoringRequestError extends ComplianceError {
  readonly status: number | null;

  constructor(message: string, status: number | null, cause?: unknown) {
    super('SCORING_REQUEST_FAILED', message, { cause });
    this.name = 'ScoringRequestError';
    this.status = status;
  }
}

export class PromptInjectionBlockedError extends ComplianceError {
  readonly toolName: string;
  readonly score: number | null;

  constructor(toolName: string, score: number | null, reason: string) {
    super('PROMPT_INJECTION_BLOCKED', `Tool call to '${toolName}' blocked: ${reason}`);
    this.name = 'PromptInjectionBlockedError';
    this.toolName = toolName;
    this.score = score;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
