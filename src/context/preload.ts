import { filter } from '../query/compose.js';
import { getAssociation } from '../schema/define.js';
import type { SchemaDefinition } from '../schema/define.js';
import type { Repository, Row } from '../types.js';

/**
 * Attaches the named associations to each row, one level deep: to-many
 * associations as arrays, to-one associations as a row or null. One query per
 * association.
 */
export async function preload(
  repo: Repository,
  schema: SchemaDefinition,
  rows: readonly Row[],
  assocs: readonly string[],
): Promise<Row[]> {
  const loaded = rows.map((row) => ({ ...row }));
  if (loaded.length === 0) return loaded;

  const ids = loaded.map((row) => row[schema.primaryKey]);
  for (const name of assocs) {
    const association = getAssociation(schema, name);
    const target = association.schema();
    const children = await repo.all(filter(target.table, { [association.foreignKey]: ids }));

    const byParent = new Map<unknown, Row[]>();
    for (const child of children) {
      const parentId = child[association.foreignKey];
      const group = byParent.get(parentId);
      if (group === undefined) byParent.set(parentId, [child]);
      else group.push(child);
    }

    for (const row of loaded) {
      const group = byParent.get(row[schema.primaryKey]) ?? [];
      row[name] = association.cardinality === 'many' ? group : group[0] ?? null;
    }
  }
  return loaded;
}
