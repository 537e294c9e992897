import { findMissingClosurePairs } from './transitivity';
import { buildVocabularySnapshot, InvalidFixtureError } from './vocabulary-fixture';

describe('findMissingClosurePairs', () => {
  it('accepts a transitive closure', () => {
    expect(
      findMissingClosurePairs([
        { ancestorId: 1, descendantId: 2 },
        { ancestorId: 2, descendantId: 3 },
        { ancestorId: 1, descendantId: 3 },
      ]),
    ).toEqual([]);
  });

  it('reports the pair a chain implies', () => {
    expect(
      findMissingClosurePairs([
        { ancestorId: 1, descendantId: 2 },
        { ancestorId: 2, descendantId: 3 },
      ]),
    ).toEqual([{ ancestorId: 1, descendantId: 3 }]);
  });

  it('ignores self rows', () => {
    expect(
      findMissingClosurePairs([
        { ancestorId: 1, descendantId: 1 },
        { ancestorId: 1, descendantId: 2 },
        { ancestorId: 2, descendantId: 2 },
      ]),
    ).toEqual([]);
  });
});

describe('buildVocabularySnapshot', () => {
  it('rejects a closure table that is not transitive', () => {
    expect(() =>
      buildVocabularySnapshot({
        concepts: [
          { concept_id: 1, concept_name: 'Root' },
          { concept_id: 2, concept_name: 'Middle' },
          { concept_id: 3, concept_name: 'Leaf' },
        ],
        ancestors: [
          [1, 2, 1],
          [2, 3, 1],
        ],
      }),
    ).toThrow(InvalidFixtureError);
  });

  it('leaves omitted tables out of the snapshot', async () => {
    const snapshot = buildVocabularySnapshot({
      concepts: [{ concept_id: 1, concept_name: 'Root' }],
      omitTables: ['concept_synonym'],
    });

    expect(snapshot.hasTable('concept_synonym')).toBe(false);
    expect(snapshot.hasTable('relationship')).toBe(true);
    await snapshot.destroy();
  });
});
