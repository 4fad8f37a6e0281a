import { SchemaDefinitionError } from '../errors.js';
import type { Row, ValidationTree } from '../types.js';

export type Changeset =
  | { readonly valid: true; readonly changes: Row }
  | { readonly valid: false; readonly errors: ValidationTree };

/** Validates `attrs`. `existing` is the stored record on update and null on create. */
export type ChangesetFn = (attrs: Readonly<Record<string, unknown>>, existing: Row | null) => Changeset;

export interface AssociationDefinition {
  readonly cardinality: 'one' | 'many';
  /** Lazy so that schemas can reference each other. */
  readonly schema: () => SchemaDefinition;
  /** Column of the associated table pointing back at this schema's primary key. */
  readonly foreignKey: string;
}

export interface SchemaDefinition {
  readonly name: string;
  readonly table: string;
  readonly primaryKey: string;
  readonly fields: readonly string[];
  readonly associations: Readonly<Record<string, AssociationDefinition>>;
  readonly changeset: ChangesetFn;
  readonly createChangeset: ChangesetFn;
  readonly updateChangeset: ChangesetFn;
}

export interface SchemaDefinitionInput {
  name: string;
  table: string;
  primaryKey?: string;
  fields: readonly string[];
  associations?: Readonly<Record<string, AssociationDefinition>>;
  changeset: ChangesetFn;
  createChangeset?: ChangesetFn;
  updateChangeset?: ChangesetFn;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Validates and completes a schema definition.
 *
 * @example
 * const User = defineSchema({
 *   name: 'User',
 *   table: 'users',
 *   fields: ['id', 'username', 'age'],
 *   associations: { posts: { cardinality: 'many', schema: () => Post, foreignKey: 'user_id' } },
 *   changeset: zodChangeset(z.object({ username: z.string().min(2) })),
 * });
 */
export function defineSchema(input: SchemaDefinitionInput): SchemaDefinition {
  if (!IDENTIFIER.test(input.name)) {
    throw new SchemaDefinitionError(`Schema name must be an identifier, got "${input.name}"`);
  }
  if (input.table.trim() === '') {
    throw new SchemaDefinitionError(`${input.name}: table must not be empty`);
  }
  if (input.fields.length === 0) {
    throw new SchemaDefinitionError(`${input.name}: at least one field is required`);
  }
  if (new Set(input.fields).size !== input.fields.length) {
    throw new SchemaDefinitionError(`${input.name}: fields must be unique`);
  }

  const primaryKey = input.primaryKey ?? 'id';
  if (!input.fields.includes(primaryKey)) {
    throw new SchemaDefinitionError(`${input.name}: primary key "${primaryKey}" is not a field`);
  }

  const associations = input.associations ?? {};
  for (const name of Object.keys(associations)) {
    if (input.fields.includes(name)) {
      throw new SchemaDefinitionError(`${input.name}: association "${name}" clashes with a field`);
    }
  }

  return {
    name: input.name,
    table: input.table,
    primaryKey,
    fields: [...input.fields],
    associations,
    changeset: input.changeset,
    createChangeset: input.createChangeset ?? input.changeset,
    updateChangeset: input.updateChangeset ?? input.changeset,
  };
}

export function getAssociation(schema: SchemaDefinition, name: string): AssociationDefinition {
  const association = Object.hasOwn(schema.associations, name) ? schema.associations[name] : undefined;
  if (association === undefined) {
    throw new SchemaDefinitionError(`${schema.name} has no association "${name}"`);
  }
  return association;
}
