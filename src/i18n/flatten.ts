import { logger as defaultLogger } from '../logger.js';
import type { FieldErrors, ValidationMessage, ValidationTree } from '../types.js';
import { interpolate } from './interpolate.js';
import { identityTranslate, withFallback } from './translator.js';
import type { ErrorNode, FlattenOptions, TranslateFn, TranslationDomains } from './types.js';

export const DEFAULT_DOMAINS: Readonly<TranslationDomains> = { errors: 'errors', schemas: 'schemas' };

type AssociationErrors = Extract<FieldErrors, { kind: 'association' }>;

interface Flattener {
  translate: TranslateFn;
  domains: TranslationDomains;
}

// Field order is ascending by code unit, independent of insertion order.
function sortedFields(tree: ValidationTree): string[] {
  return Object.keys(tree).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function translateMessage(ctx: Flattener, { message, params = {} }: ValidationMessage): string {
  return interpolate(ctx.translate(ctx.domains.errors, message, params), params);
}

function translateField(ctx: Flattener, field: string): string {
  return ctx.translate(ctx.domains.schemas, field, {});
}

function childTrees(errors: AssociationErrors): readonly ValidationTree[] {
  return errors.cardinality === 'one' ? [errors.child] : errors.children;
}

/**
 * Children of an association are rendered one level at a time: a child field
 * holding messages is prefixed with the association name, a child association
 * contributes its own rendering unprefixed.
 */
function flattenAssociation(ctx: Flattener, field: string, errors: AssociationErrors): string[] {
  const prefix = translateField(ctx, field);
  const out: string[] = [];
  for (const message of errors.messages ?? []) {
    out.push(`${prefix} ${translateMessage(ctx, message)}`);
  }
  for (const child of childTrees(errors)) {
    for (const childField of sortedFields(child)) {
      const childErrors = child[childField];
      if (childErrors === undefined) continue;
      if (childErrors.kind === 'association') {
        out.push(...flattenAssociation(ctx, childField, childErrors));
        continue;
      }
      const childName = translateField(ctx, childField);
      for (const message of childErrors.messages) {
        out.push(`${prefix}: ${childName} ${translateMessage(ctx, message)}`);
      }
    }
  }
  return out;
}

function flattenTree(ctx: Flattener, tree: ValidationTree): string[] {
  const out: string[] = [];
  for (const field of sortedFields(tree)) {
    const errors = tree[field];
    if (errors === undefined) continue;
    if (errors.kind === 'association') {
      out.push(...flattenAssociation(ctx, field, errors));
      continue;
    }
    const name = translateField(ctx, field);
    for (const message of errors.messages) {
      out.push(`${name} ${translateMessage(ctx, message)}`);
    }
  }
  return out;
}

function flattenNode(ctx: Flattener, node: ErrorNode): unknown[] {
  switch (node.kind) {
    case 'validation':
      return flattenTree(ctx, node.tree);
    case 'not-found': {
      const message = ctx.translate(ctx.domains.errors, node.message, {});
      return [`${translateField(ctx, node.schema)} ${message}`];
    }
    case 'message':
      return node.message === '' ? [''] : [ctx.translate(ctx.domains.errors, node.message, {})];
    case 'opaque':
      return [node.value];
  }
}

function createFlattener(options: FlattenOptions): Flattener {
  const log = options.logger ?? defaultLogger;
  return {
    translate: withFallback(options.translate ?? identityTranslate, log),
    domains: { ...DEFAULT_DOMAINS, ...options.domains },
  };
}

/**
 * Renders error nodes as an ordered list of human-readable strings. Opaque
 * nodes come back as the values they wrap.
 *
 * @example
 * flattenErrors([{ kind: 'not-found', message: 'not found', schema: 'user' }])
 * // => ['user not found']
 */
export function flattenErrors(errors: readonly ErrorNode[], options: FlattenOptions = {}): unknown[] {
  const ctx = createFlattener(options);
  return errors.flatMap((node) => flattenNode(ctx, node));
}

/** Renders a single validation tree. */
export function flattenValidationTree(tree: ValidationTree, options: FlattenOptions = {}): string[] {
  return flattenTree(createFlattener(options), tree);
}
