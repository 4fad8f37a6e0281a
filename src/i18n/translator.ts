import type { BaseLogger } from '../logger.js';
import type { Bindings, TranslateFn, Translator } from './types.js';

export const identityTranslate: TranslateFn = (_domain, msgid) => msgid;

export const identityTranslator: Translator = {
  defaultLocale: 'en',
  translate: (_locale, _domain, msgid) => msgid,
};

/** Fixes the locale of a translator. */
export function bindLocale(translator: Translator, locale: string = translator.defaultLocale): TranslateFn {
  return (domain, msgid, bindings) => translator.translate(locale, domain, msgid, bindings);
}

/**
 * Wraps a translate function so a throwing or non-string lookup falls back to
 * the identity translation of that msgid.
 */
export function withFallback(translate: TranslateFn, logger: BaseLogger): TranslateFn {
  return (domain: string, msgid: string, bindings: Bindings): string => {
    try {
      const translated: unknown = translate(domain, msgid, bindings);
      if (typeof translated === 'string') return translated;
      logger.warn({ domain, msgid }, 'translator returned a non-string value; using msgid');
    } catch (err) {
      logger.warn({ err, domain, msgid }, 'translator failed; using msgid');
    }
    return identityTranslate(domain, msgid, bindings);
  };
}
