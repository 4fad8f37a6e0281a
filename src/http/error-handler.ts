import type { FastifyInstance, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import {
  ChangesetError,
  MultipleResultsError,
  NotFoundError,
  QueryOptionsError,
  StaleRecordError,
} from '../errors.js';
import { getDefaultTranslator } from '../i18n/catalog.js';
import { toErrorNode } from '../i18n/classify.js';
import { flattenErrors } from '../i18n/flatten.js';
import { bindLocale } from '../i18n/translator.js';
import type { Translator } from '../i18n/types.js';

export interface ErrorHandlerOptions {
  translator?: Translator;
}

/** `pt-BR,pt;q=0.9,en;q=0.8` → `pt_BR` */
export function localeFromHeader(header: string | undefined): string | undefined {
  const tag = header?.split(',')[0]?.split(';')[0]?.trim();
  return tag === undefined || tag === '' || tag === '*' ? undefined : tag.replace(/-/g, '_');
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof ChangesetError) return 422;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof StaleRecordError || error instanceof MultipleResultsError) return 409;
  if (error instanceof QueryOptionsError) return 400;
  return undefined;
}

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

/**
 * Renders library errors as `{ errors: string[] }`, flattened and translated
 * for the locale of the request's Accept-Language header.
 */
export function registerErrorHandler(app: FastifyInstance, options: ErrorHandlerOptions = {}): void {
  const translate = (request: FastifyRequest, error: unknown): unknown[] => {
    const translator = options.translator ?? getDefaultTranslator();
    const locale = localeFromHeader(request.headers['accept-language']) ?? translator.defaultLocale;
    return flattenErrors([toErrorNode(error)], {
      translate: bindLocale(translator, locale),
      ...(translator.domains !== undefined ? { domains: translator.domains } : {}),
      logger: request.log,
    });
  };

  app.setErrorHandler((error, request, reply) => {
    const status = statusOf(error);
    if (status !== undefined) {
      request.log.info({ err: error, status }, 'request rejected');
      return reply.status(status).send({ errors: translate(request, error) });
    }

    // Fastify's own errors (validation, malformed body) carry their status
    if (hasStatusCode(error) && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ errors: [error.message] });
    }

    request.log.error({ err: error }, 'request failed');
    return reply.status(500).send({ errors: ['Internal server error'] });
  });
}

/** Plugin form of registerErrorHandler; applies to the instance it is registered on. */
export const errorHandler = fp<ErrorHandlerOptions>(
  async (app, options) => {
    registerErrorHandler(app, options);
  },
  { name: 'crudforge-error-handler' },
);
