import { sql } from 'kysely';

// Predicates shared by repositories, parameterised by the concept table alias

export const validConcept = (alias: string) => {
  const column = sql.ref(`${alias}.invalid_reason`);
  return sql<boolean>`(${column} IS NULL OR ${column} = '')`;
};

export const standardValidConcept = (alias: string) =>
  sql<boolean>`(${sql.ref(`${alias}.standard_concept`)} = 'S' AND ${validConcept(alias)})`;

/**
 * `ref IN (ids)` bound as one JSON parameter, so the list size is not
 * limited by SQLite's bound-variable cap.
 */
export const inIdList = (ref: string, ids: readonly number[]) =>
  sql<boolean>`${sql.ref(ref)} IN (SELECT value FROM json_each(${JSON.stringify(ids)}))`;

/**
 * Concept `target` may be derived from `source`: valid, same vocabulary,
 * and a Clinical Drug when it belongs to the Drug domain.
 */
export const enrichmentTarget = (source: string, target: string) =>
  sql<boolean>`(${sql.ref(`${target}.vocabulary_id`)} = ${sql.ref(`${source}.vocabulary_id`)}
    AND ${validConcept(target)}
    AND (${sql.ref(`${target}.domain_id`)} != 'Drug' OR ${sql.ref(`${target}.concept_class_id`)} = 'Clinical Drug'))`;
