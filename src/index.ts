export { from, filter, search, list } from './query/compose.js';
export { normalizeOrderBy, parseListOptions } from './query/options.js';
export { normalizeField } from './query/fields.js';
export { compileSelectQuery, compileCountQuery } from './query/compiler.js';
export type { CompiledQuery } from './query/compiler.js';
export { evaluate } from './query/evaluate.js';
export type { Tables } from './query/evaluate.js';
export type {
  Direction,
  FieldName,
  Predicate,
  OrderClause,
  QueryDescriptor,
  Queryable,
  CustomQuery,
  OrderByEntry,
  OrderBy,
  ListOptions,
  ListOptionsInput,
  FilterMap,
} from './query/types.js';

export { flattenErrors, flattenValidationTree, DEFAULT_DOMAINS } from './i18n/flatten.js';
export { toErrorNode, toErrorNodes } from './i18n/classify.js';
export { interpolate } from './i18n/interpolate.js';
export { identityTranslator, identityTranslate, bindLocale } from './i18n/translator.js';
export {
  loadCatalogs,
  mergeCatalogs,
  createCatalogTranslator,
  createDefaultTranslator,
  getDefaultTranslator,
  BUNDLED_LOCALES_DIR,
} from './i18n/catalog.js';
export type { Catalog, Catalogs, CatalogTranslatorOptions, DefaultTranslatorOptions } from './i18n/catalog.js';
export type {
  ErrorNode,
  Bindings,
  TranslateFn,
  TranslationDomains,
  Translator,
  FlattenOptions,
} from './i18n/types.js';

export { defineSchema } from './schema/define.js';
export type {
  AssociationDefinition,
  Changeset,
  ChangesetFn,
  SchemaDefinition,
  SchemaDefinitionInput,
} from './schema/define.js';
export { zodChangeset, issuesToTree } from './schema/zod-changeset.js';

export { PostgresRepository, createPostgresRepository } from './store/postgres-repository.js';
export type { PostgresRepositoryConfig } from './store/postgres-repository.js';
export { MemoryRepository } from './store/memory-repository.js';
export type { MemoryRepositoryOptions, ForeignKey } from './store/memory-repository.js';

export { createContext, defineContextDefaults } from './context/context.js';
export type { Attrs, ContextOptions, CrudContext, ContextFactory } from './context/context.js';
export { CRUD_FUNCTIONS } from './context/selection.js';
export type { CrudFunction, FunctionSelection } from './context/selection.js';

export { createResolvers } from './resolver/resolvers.js';
export type { CrudResolvers } from './resolver/resolvers.js';
export { translateErrors, withMiddleware } from './resolver/middleware.js';
export type { Middleware, Resolution, ResolutionContext, Resolver, ResolverResult } from './resolver/types.js';

export { crudRoutes } from './http/routes.js';
export type { CrudRoutesOptions } from './http/routes.js';
export { registerErrorHandler, errorHandler } from './http/error-handler.js';
export type { ErrorHandlerOptions } from './http/error-handler.js';

export { resolveConfig } from './config.js';
export type { CrudforgeConfig, CrudforgeConfigInput } from './config.js';
export { createLogger, logger, resolveLogLevel } from './logger.js';
export type { ResolvedLogLevel } from './logger.js';

export type { Row, RecordId, ValidationMessage, FieldErrors, ValidationTree, Repository } from './types.js';
export {
  QueryOptionsError,
  RepositoryError,
  StaleRecordError,
  NotFoundError,
  MultipleResultsError,
  ChangesetError,
  SchemaDefinitionError,
  ConfigurationError,
} from './errors.js';
