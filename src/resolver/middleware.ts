import { toErrorNodes } from '../i18n/classify.js';
import { getDefaultTranslator } from '../i18n/catalog.js';
import { flattenErrors } from '../i18n/flatten.js';
import { bindLocale } from '../i18n/translator.js';
import type { Middleware, Resolution, ResolutionContext, Resolver } from './types.js';

/**
 * Replaces the errors of a failed resolution with translated, human-readable
 * messages. Translator and locale come from the resolution context; the
 * bundled catalogs and their default locale are used otherwise.
 */
export const translateErrors: Middleware = <T>(resolution: Resolution<T>): Resolution<T> => {
  const { result, context } = resolution;
  if (result.ok) return resolution;

  const translator = context.translator ?? getDefaultTranslator();
  const errors = flattenErrors(toErrorNodes(result.errors), {
    translate: bindLocale(translator, context.locale ?? translator.defaultLocale),
    ...(translator.domains !== undefined ? { domains: translator.domains } : {}),
    ...(context.logger !== undefined ? { logger: context.logger } : {}),
  });
  return { context, result: { ok: false, errors } };
};

/** Runs `middleware` in order over the result of `resolver`. */
export function withMiddleware<A, T>(resolver: Resolver<A, T>, ...middleware: Middleware[]): Resolver<A, T> {
  return async (args: A, context: ResolutionContext) => {
    let resolution: Resolution<T> = { result: await resolver(args, context), context };
    for (const step of middleware) {
      resolution = step(resolution);
    }
    return resolution.result;
  };
}
