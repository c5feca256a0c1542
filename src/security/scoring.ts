/**
 * HTTP client for the external threat-scoring service.
 *
 * POST {base_url}/v1/analysis/{analysis_id}?tag&scan_type=input&detections
 * with a bearer token and the raw text as a text/plain body. Every failure
 * surfaces as a typed error; callers turn those into "could not verify".
 */

import { z } from 'zod';
import { ScoringRequestError, ScoringUnavailableError, describeError } from '../errors.js';
import type { AnalysisResponse, ComplianceConfig } from '../types/index.js';

export interface ScoringCredentials {
  api_token?: string;
  analysis_id?: string;
}

export interface AnalyzeOptions {
  tag: string;
  detections: readonly string[];
  /** Per-call credentials; fall back to the configured ones. */
  credentials?: ScoringCredentials;
}

export interface ScoringResult {
  response: AnalysisResponse;
  endpoint: string;
}

export interface ScoringService {
  isConfigured(credentials?: ScoringCredentials): boolean;
  analyze(text: string, options: AnalyzeOptions): Promise<ScoringResult>;
}

export const AnalysisResponseSchema = z.object({
  analysis: z.array(z.object({
    type: z.string(),
    name: z.string().optional(),
    result: z.unknown().optional(),
  })).default([]),
  tag: z.string().nullable().optional(),
});

export class ScoringClient implements ScoringService {
  constructor(private readonly settings: ComplianceConfig['scoring']) {}

  isConfigured(credentials?: ScoringCredentials): boolean {
    return this.resolve(credentials) !== null;
  }

  endpoint(analysisId: string): string {
    return `${this.settings.base_url.replace(/\/+$/, '')}/v1/analysis/${encodeURIComponent(analysisId)}`;
  }

  async analyze(text: string, options: AnalyzeOptions): Promise<ScoringResult> {
    const creds = this.resolve(options.credentials);
    if (!creds) {
      throw new ScoringUnavailableError('Scoring service is not configured: set SCORING_API_TOKEN and SCORING_ANALYSIS_ID');
    }

    const endpoint = this.endpoint(creds.analysis_id);
    const query = new URLSearchParams({
      tag: options.tag,
      scan_type: 'input',
      detections: options.detections.join(','),
    });

    let reply: HttpReply;
    try {
      reply = await fetchWithTimeout(`${endpoint}?${query.toString()}`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${creds.api_token}`,
          'Content-Type': 'text/plain',
        },
        body: text,
      }, this.settings.timeout_ms, readReply);
    } catch (err) {
      throw new ScoringRequestError(`Scoring request failed: ${describeError(err)}`, null, err);
    }

    if (!reply.ok) {
      throw new ScoringRequestError(`Scoring service ${reply.status}: ${reply.text}`, reply.status);
    }

    let body: unknown;
    try {
      body = JSON.parse(reply.text);
    } catch (err) {
      throw new ScoringRequestError(`Scoring service returned invalid JSON: ${describeError(err)}`, reply.status, err);
    }

    const parsed = AnalysisResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ScoringRequestError(`Unexpected scoring response: ${parsed.error.issues[0].message}`, reply.status);
    }
    return { response: parsed.data, endpoint };
  }

  private resolve(credentials?: ScoringCredentials): { api_token: string; analysis_id: string } | null {
    const token = credentials?.api_token || this.settings.api_token;
    const analysisId = credentials?.analysis_id || this.settings.analysis_id;
    return token && analysisId ? { api_token: token, analysis_id: analysisId } : null;
  }
}

export interface HttpReply {
  status: number;
  ok: boolean;
  text: string;
}

export async function readReply(resp: Response): Promise<HttpReply> {
  return { status: resp.status, ok: resp.ok, text: await resp.text() };
}

/** The timeout covers the body as well: `read` runs before the timer is cleared. */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (resp: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
  try {
    const resp = await fetch(url, { ...init, signal: controller.signal });
    return await read(resp);
  } finally {
    clearTimeout(timer);
  }
}
