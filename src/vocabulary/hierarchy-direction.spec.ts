import { Logger } from '@nestjs/common';
import { HierarchyDirectionResolver } from './hierarchy-direction';
import type { RelationshipKind } from './vocabulary.types';

const kind = (
  relationshipId: string,
  reverseRelationshipId: string,
  definesAncestry = true,
): RelationshipKind => ({ relationshipId, reverseRelationshipId, definesAncestry });

describe('HierarchyDirectionResolver', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it('orients curated kinds from the table', () => {
    const resolver = new HierarchyDirectionResolver([
      kind('Is a', 'Subsumes'),
      kind('Subsumes', 'Is a'),
    ]);

    expect(resolver.orient({ conceptId1: 1, conceptId2: 2, relationshipId: 'Is a' })).toEqual({
      parentId: 2,
      childId: 1,
    });
    expect(
      resolver.orient({ conceptId1: 1, conceptId2: 2, relationshipId: 'Subsumes' }),
    ).toEqual({ parentId: 1, childId: 2 });
    expect(warn).not.toHaveBeenCalled();
  });

  it('prefers the curated table over the name comparison', () => {
    // "Available as box" sorts before "Box of" but points parent -> child
    const resolver = new HierarchyDirectionResolver([
      kind('Available as box', 'Box of'),
      kind('Box of', 'Available as box'),
    ]);

    expect(
      resolver.orient({ conceptId1: 5, conceptId2: 6, relationshipId: 'Available as box' }),
    ).toEqual({ parentId: 5, childId: 6 });
    expect(
      resolver.orient({ conceptId1: 5, conceptId2: 6, relationshipId: 'Box of' }),
    ).toEqual({ parentId: 6, childId: 5 });
  });

  it('falls back to the name comparison and warns once per kind', () => {
    const resolver = new HierarchyDirectionResolver([
      kind('Alpha', 'Beta'),
      kind('Beta', 'Alpha'),
    ]);

    expect(resolver.orient({ conceptId1: 1, conceptId2: 2, relationshipId: 'Alpha' })).toEqual({
      parentId: 2,
      childId: 1,
    });
    expect(resolver.orient({ conceptId1: 1, conceptId2: 2, relationshipId: 'Beta' })).toEqual({
      parentId: 1,
      childId: 2,
    });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      'Hierarchy direction of "Alpha" is not curated, inferred from its reverse name',
    );
  });

  it('ignores kinds that do not define ancestry', () => {
    const resolver = new HierarchyDirectionResolver([
      kind('Is a', 'Subsumes'),
      kind('Maps to', 'Mapped from', false),
    ]);

    expect(resolver.hierarchicalKinds).toEqual(['Is a']);
    expect(resolver.isHierarchical('Maps to')).toBe(false);
    expect(
      resolver.orient({ conceptId1: 1, conceptId2: 2, relationshipId: 'Maps to' }),
    ).toBeNull();
  });
});
