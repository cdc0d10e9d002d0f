import { Readable } from 'stream';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z } from 'zod';

import type { AuditLog } from './audit/index.js';
import type { ConsultationGateway } from './gateway/index.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { aggregateRecord, buildSupportSummary, findLeaks, StudentRecordSchema } from './privacy/index.js';
import { buildCoachPrompt } from './prompts/coach.js';
import { buildStudentInsightsPrompt } from './prompts/student-insights.js';
import type { SettingsStore } from './settings/store.js';
import type { ErrorCode, StudentRecord } from './types/index.js';
import { BackendSelectionSchema, ConfigurationError, renderFragment } from './types/index.js';

export const VERSION = '1.0.0';

export interface ServerDependencies {
  gateway: ConsultationGateway;
  settings?: SettingsStore;
  audit?: AuditLog;
  logger?: Logger;
  corsOrigins?: (string | RegExp)[];
  requestsPerMinute?: number;
}

const ConsentBodySchema = z.object({
  institutional: z.boolean().optional(),
  data: z.boolean().optional()
});

const SafeViewBodySchema = z.object({ record: StudentRecordSchema });

const ConsultBodySchema = z.object({
  message: z.string().min(1),
  history: z
    .array(z.object({ role: z.enum(['user', 'assistant']), content: z.string() }))
    .optional(),
  record: StudentRecordSchema.optional(),
  prompt: z.enum(['coach', 'student-insights']).default('coach')
});

function systemPromptFor(prompt: 'coach' | 'student-insights', record: StudentRecord): string {
  if (prompt === 'student-insights') {
    return buildStudentInsightsPrompt(buildSupportSummary(record.profile, record.supports, record.activityLogs));
  }
  return buildCoachPrompt(aggregateRecord(record).fullView);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

const REFUSAL_CODES: ReadonlySet<ErrorCode> = new Set(['NOT_CONFIGURED', 'CONSENT_REQUIRED']);

export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const { gateway, settings, audit } = deps;
  const log = (deps.logger ?? rootLogger).child({ component: 'http' });

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: deps.corsOrigins ?? false,
    credentials: true
  });

  await app.register(rateLimit, {
    max: deps.requestsPerMinute ?? 60,
    timeWindow: '1 minute'
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ConfigurationError) {
      reply.status(400).send({ error_code: error.code, message: error.message });
      return;
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      log.error({ err: error, url: request.url }, 'Request failed');
    }
    reply.status(statusCode).send({ error_code: 'INTERNAL', message: error.message });
  });

  app.addHook('onClose', async () => {
    await gateway.close();
  });

  app.get('/api/health', async () => {
    return {
      status: 'healthy',
      version: VERSION,
      gateway: gateway.status(),
      audit_log_valid: audit ? audit.verify().valid : null
    };
  });

  app.put('/api/gateway', async (request, reply) => {
    const parsed = BackendSelectionSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return { error_code: 'INVALID_CONFIG', message: describeIssues(parsed.error) };
    }

    const status = gateway.configure(parsed.data);
    const current = gateway.toSettings();
    if (settings && current) {
      settings.save(current);
    }
    return status;
  });

  app.put('/api/gateway/consent', async (request, reply) => {
    const parsed = ConsentBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return { error_code: 'INVALID_REQUEST', message: describeIssues(parsed.error) };
    }

    if (parsed.data.institutional !== undefined) {
      gateway.setInstitutionalConsent(parsed.data.institutional);
    }
    if (parsed.data.data !== undefined) {
      gateway.setDataConsent(parsed.data.data);
    }
    const current = gateway.toSettings();
    if (settings && current) {
      settings.save(current);
    }
    return gateway.status();
  });

  app.get('/api/gateway/probe', async () => {
    return gateway.probe();
  });

  // The full view never leaves the process; only the safe view is returned
  app.post('/api/safe-view', async (request, reply) => {
    const parsed = SafeViewBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return { error_code: 'INVALID_REQUEST', message: describeIssues(parsed.error) };
    }

    const { record } = parsed.data;
    const { safeView } = aggregateRecord(record);
    const leaks = findLeaks(safeView, record.profile, record.supports);
    if (leaks.length > 0) {
      log.warn(
        { count: leaks.length, sources: leaks.map((leak) => leak.source) },
        'Safe view repeats free text verbatim through fallback themes'
      );
    }
    return { safe_view: safeView };
  });

  app.post('/api/consult', async (request, reply) => {
    const parsed = ConsultBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return { error_code: 'INVALID_REQUEST', message: describeIssues(parsed.error) };
    }

    const { message, history, record, prompt } = parsed.data;
    const systemPrompt = record ? systemPromptFor(prompt, record) : undefined;
    const status = gateway.status();

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    async function* body(): AsyncGenerator<string> {
      let output = '';
      let fragmentCount = 0;
      let errorCode: ErrorCode | undefined;

      try {
        for await (const fragment of gateway.generate(message, {
          systemPrompt,
          history,
          signal: controller.signal
        })) {
          fragmentCount++;
          if (fragment.kind === 'text') {
            output += fragment.text;
          } else {
            errorCode = fragment.code;
          }
          yield renderFragment(fragment);
        }
      } finally {
        audit?.log({
          action: errorCode && REFUSAL_CODES.has(errorCode) ? 'REFUSED' : 'CONSULT',
          family: status.family,
          model: status.model,
          input: message,
          output,
          fragmentCount,
          errorCode
        });
      }
    }

    reply.type('text/plain; charset=utf-8');
    return reply.send(Readable.from(body()));
  });

  return app;
}
