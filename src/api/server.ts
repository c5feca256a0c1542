/**
 * REST scoring API. Forwards text to the scoring service and returns the
 * normalized prompt-injection score. Used as the proxy's local detector.
 */

import Fastify, { type FastifyInstance, type FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ScoringUnavailableError, describeError } from '../errors.js';
import { scoreOf, type ScoringService } from '../security/index.js';
import { SERVER_VERSION } from '../server.js';

const DetectRequestSchema = z.object({
  text: z.string(),
  threshold: z.number().min(0).max(1).nullish().transform((v) => v ?? 0.5),
  tag: z.string().min(1).nullish(),
});

export interface DetectResponse {
  analysis: Array<{ type: 'score'; name: 'prompt_injection'; result: number }>;
  tag: string | null;
  threshold: number;
  is_prompt_injection: boolean;
}

export interface ApiServerOptions {
  scoring: ScoringService;
  logger?: boolean;
}

export function buildApiServer(options: ApiServerOptions): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? false });
  app.register(detectionRoutes(options.scoring));
  return app;
}

function detectionRoutes(scoring: ScoringService): FastifyPluginAsync {
  return async (app) => {
    app.get('/', async () => ({
      name: 'Prompt Injection Detection API',
      description: 'Scores text for prompt injection using the configured scoring service',
      version: SERVER_VERSION,
      endpoints: {
        '/detect_prompt_injection': 'POST - Analyze text for prompt injections',
      },
    }));

    app.post('/detect_prompt_injection', async (req, reply) => {
      const parsed = DetectRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({
          error: 'Invalid request body',
          issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
        });
      }

      const { text, threshold, tag } = parsed.data;
      if (!scoring.isConfigured()) {
        return reply.code(503).send({ error: 'Scoring service credentials are not configured' });
      }

      try {
        const { response } = await scoring.analyze(text, { tag: tag ?? 'rest_api', detections: ['prompt_injection'] });
        const score = scoreOf(response, 'prompt_injection');
        const body: DetectResponse = {
          analysis: [{ type: 'score', name: 'prompt_injection', result: score }],
          tag: response.tag ?? tag ?? null,
          threshold,
          is_prompt_injection: score > threshold,
        };
        return body;
      } catch (err) {
        const status = err instanceof ScoringUnavailableError ? 503 : 502;
        req.log.error({ err }, 'scoring request failed');
        return reply.code(status).send({ error: `Error analyzing text: ${describeError(err)}` });
      }
    });
  };
}
