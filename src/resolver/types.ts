import type { BaseLogger } from '../logger.js';
import type { Translator } from '../i18n/types.js';

export type ResolverResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: readonly unknown[] };

/** Per-request values shared by resolvers and middleware. */
export interface ResolutionContext {
  translator?: Translator;
  locale?: string;
  logger?: BaseLogger;
}

export interface Resolution<T> {
  readonly result: ResolverResult<T>;
  readonly context: ResolutionContext;
}

export type Resolver<A, T> = (args: A, context: ResolutionContext) => Promise<ResolverResult<T>>;

export type Middleware = <T>(resolution: Resolution<T>) => Resolution<T>;
