/**
 * Screens outgoing tool-call arguments for prompt injection
 * before forwarding them to another MCP server.
 *
 * Detection order: local REST API, then the scoring service. When neither
 * answers the verdict is `unverified`, never "safe".
 */

import { PromptInjectionBlockedError, describeError } from '../errors.js';
import { AnalysisResponseSchema, ScoringClient, fetchWithTimeout, readReply, type ScoringService } from './scoring.js';
import { scoreOf } from './scanner.js';
import type { ComplianceConfig } from '../types/index.js';

export type InjectionVerdict =
  | { status: 'scored'; score: number; source: 'local_api' | 'scoring_service' }
  | { status: 'unverified'; reason: string };

export interface InjectionDetectorOptions {
  /** Base URL of the REST scoring API; null skips it. */
  local_api_url: string | null;
  scoring: ScoringService | null;
  threshold: number;
  timeout_ms: number;
}

const PROXY_TAG = 'mcp_proxy';

export class InjectionDetector {
  constructor(private readonly opts: InjectionDetectorOptions) {}

  async detect(text: string): Promise<InjectionVerdict> {
    const reasons: string[] = [];

    if (this.opts.local_api_url) {
      try {
        return { status: 'scored', score: await this.viaLocalApi(this.opts.local_api_url, text), source: 'local_api' };
      } catch (err) {
        console.error(`[proxy] Local API unavailable: ${describeError(err)}`);
        reasons.push(`local API: ${describeError(err)}`);
      }
    }

    const scoring = this.opts.scoring;
    if (scoring?.isConfigured()) {
      try {
        const { response } = await scoring.analyze(text, { tag: PROXY_TAG, detections: ['prompt_injection'] });
        return { status: 'scored', score: scoreOf(response, 'prompt_injection'), source: 'scoring_service' };
      } catch (err) {
        console.error(`[proxy] Scoring service unavailable: ${describeError(err)}`);
        reasons.push(`scoring service: ${describeError(err)}`);
      }
    } else {
      reasons.push('scoring service: not configured');
    }

    return { status: 'unverified', reason: reasons.join('; ') };
  }

  private async viaLocalApi(baseUrl: string, text: string): Promise<number> {
    const reply = await fetchWithTimeout(`${baseUrl.replace(/\/+$/, '')}/detect_prompt_injection`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text, threshold: this.opts.threshold, tag: PROXY_TAG }),
    }, this.opts.timeout_ms, readReply);
    if (!reply.ok) throw new Error(`HTTP ${reply.status}`);
    return scoreOf(AnalysisResponseSchema.parse(JSON.parse(reply.text)), 'prompt_injection');
  }
}

// ---------------------------------------------------------------------------
// Secure client
// ---------------------------------------------------------------------------

export interface ToolCallRequest {
  name: string;
  arguments?: Record<string, unknown>;
}

/** Anything with an MCP-style callTool; the SDK Client satisfies this. */
export interface ToolCaller<R> {
  callTool(request: ToolCallRequest): Promise<R>;
}

export interface DetectionEvent {
  tool: string;
  score: number;
  source: 'local_api' | 'scoring_service';
  text: string;
}

export interface SecureToolClientOptions {
  threshold?: number;
  block_injections?: boolean;
  block_unverified?: boolean;
  onDetection?: (event: DetectionEvent) => void;
}

export class SecureToolClient<R> {
  private readonly threshold: number;
  private readonly blockInjections: boolean;
  private readonly blockUnverified: boolean;

  constructor(
    readonly inner: ToolCaller<R>,
    private readonly detector: Pick<InjectionDetector, 'detect'>,
    private readonly options: SecureToolClientOptions = {},
  ) {
    this.threshold = options.threshold ?? 0.65;
    this.blockInjections = options.block_injections ?? true;
    this.blockUnverified = options.block_unverified ?? false;
  }

  async callTool(request: ToolCallRequest): Promise<R> {
    const text = extractText(request.arguments ?? {});
    if (text.length === 0) return this.inner.callTool(request);

    const verdict = await this.detector.detect(text);
    if (verdict.status === 'unverified') {
      if (this.blockUnverified) {
        throw new PromptInjectionBlockedError(request.name, null, `input could not be verified (${verdict.reason})`);
      }
      console.error(`[proxy] Forwarding unverified call to ${request.name}: ${verdict.reason}`);
      return this.inner.callTool(request);
    }

    if (verdict.score > this.threshold) {
      this.options.onDetection?.({ tool: request.name, score: verdict.score, source: verdict.source, text });
      if (this.blockInjections) {
        throw new PromptInjectionBlockedError(
          request.name,
          verdict.score,
          `prompt injection score ${verdict.score} exceeds ${this.threshold}`,
        );
      }
    }

    return this.inner.callTool(request);
  }
}

export interface ProxyWiring {
  /** Defaults to a ScoringClient over `config.scoring`; null skips the scoring service. */
  scoring?: ScoringService | null;
  onDetection?: (event: DetectionEvent) => void;
}

/** Detector and client built from the `proxy` and `scoring` config sections. */
export function secureToolClientFromConfig<R>(
  inner: ToolCaller<R>,
  config: Pick<ComplianceConfig, 'proxy' | 'scoring'>,
  wiring: ProxyWiring = {},
): SecureToolClient<R> {
  const detector = new InjectionDetector({
    local_api_url: config.proxy.local_api_url,
    scoring: wiring.scoring === undefined ? new ScoringClient(config.scoring) : wiring.scoring,
    threshold: config.proxy.threshold,
    timeout_ms: config.scoring.timeout_ms,
  });
  return new SecureToolClient(inner, detector, {
    threshold: config.proxy.threshold,
    block_injections: config.proxy.block_injections,
    block_unverified: config.proxy.block_unverified,
    onDetection: wiring.onDetection,
  });
}

/** Every string in the arguments, depth-first, space-joined. */
export function extractText(value: unknown): string {
  const parts: string[] = [];
  const walk = (v: unknown): void => {
    if (typeof v === 'string') {
      if (v.length > 0) parts.push(v);
    } else if (Array.isArray(v)) {
      for (const item of v) walk(item);
    } else if (typeof v === 'object' && v !== null) {
      for (const item of Object.values(v)) walk(item);
    }
  };
  walk(value);
  return parts.join(' ');
}
