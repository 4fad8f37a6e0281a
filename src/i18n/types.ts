import type { ValidationTree } from '../types.js';
import type { BaseLogger } from '../logger.js';

/** One failure to be rendered as user-facing text. */
export type ErrorNode =
  | { kind: 'validation'; tree: ValidationTree }
  | { kind: 'not-found'; message: string; schema: string }
  | { kind: 'message'; message: string }
  | { kind: 'opaque'; value: unknown };

export type Bindings = Readonly<Record<string, unknown>>;

/** Looks up `msgid` in `domain` for an already chosen locale. */
export type TranslateFn = (domain: string, msgid: string, bindings: Bindings) => string;

export interface TranslationDomains {
  /** Domain of validation and error messages. */
  errors: string;
  /** Domain of field and schema names. */
  schemas: string;
}

/** A locale-aware translation provider. */
export interface Translator {
  readonly defaultLocale: string;
  readonly domains?: Partial<TranslationDomains>;
  translate(locale: string, domain: string, msgid: string, bindings: Bindings): string;
}

export interface FlattenOptions {
  translate?: TranslateFn;
  domains?: Partial<TranslationDomains>;
  logger?: BaseLogger;
}
