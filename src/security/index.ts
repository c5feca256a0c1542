/**
 * Scoring client, Article 15 scans and the proxy client.
 */
export { ScoringClient, AnalysisResponseSchema, fetchWithTimeout, readReply } from './scoring.js';
export type { ScoringService, ScoringCredentials, ScoringResult, AnalyzeOptions, HttpReply } from './scoring.js';
export {
  scanForPromptInjection, checkSensitiveFileAccess,
  assessInjection, assessFileAccess, classifySensitivePath, scoreOf, threatLevel,
  INJECTION_THRESHOLD,
} from './scanner.js';
export type { InjectionScanRequest, FileAccessRequest } from './scanner.js';
export { InjectionDetector, SecureToolClient, secureToolClientFromConfig, extractText } from './proxy.js';
export type {
  InjectionVerdict, InjectionDetectorOptions, ToolCaller, ToolCallRequest,
  DetectionEvent, SecureToolClientOptions, ProxyWiring,
} from './proxy.js';
