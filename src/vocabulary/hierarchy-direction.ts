import { Logger } from '@nestjs/common';
import curatedDirections from './data/hierarchy-directions.json';
import type { RelationshipEdge, RelationshipKind } from './vocabulary.types';

export interface CuratedDirections {
  childToParent: string[];
  parentToChild: string[];
}

export interface OrientedEdge {
  parentId: number;
  childId: number;
}

/**
 * Decides which end of a hierarchical relationship is the parent.
 *
 * Kinds listed in the curated table are oriented by it. Any other kind falls
 * back to comparing its id with its reverse: the one that sorts first is
 * read as child -> parent.
 */
export class HierarchyDirectionResolver {
  private readonly logger = new Logger(HierarchyDirectionResolver.name);
  private readonly childToParent = new Map<string, boolean>();

  constructor(
    kinds: RelationshipKind[],
    curated: CuratedDirections = curatedDirections,
  ) {
    const upward = new Set(curated.childToParent);
    const downward = new Set(curated.parentToChild);
    const uncurated: string[] = [];

    for (const kind of kinds) {
      if (!kind.definesAncestry) continue;
      if (upward.has(kind.relationshipId)) {
        this.childToParent.set(kind.relationshipId, true);
      } else if (downward.has(kind.relationshipId)) {
        this.childToParent.set(kind.relationshipId, false);
      } else {
        this.childToParent.set(
          kind.relationshipId,
          kind.relationshipId < kind.reverseRelationshipId,
        );
        uncurated.push(kind.relationshipId);
      }
    }

    for (const id of uncurated) {
      this.logger.warn(
        `Hierarchy direction of "${id}" is not curated, inferred from its reverse name`,
      );
    }
  }

  get hierarchicalKinds(): string[] {
    return [...this.childToParent.keys()];
  }

  isHierarchical(relationshipId: string): boolean {
    return this.childToParent.has(relationshipId);
  }

  /** Returns null for kinds that do not define ancestry. */
  orient(edge: RelationshipEdge): OrientedEdge | null {
    const upward = this.childToParent.get(edge.relationshipId);
    if (upward === undefined) return null;
    return upward
      ? { parentId: edge.conceptId2, childId: edge.conceptId1 }
      : { parentId: edge.conceptId1, childId: edge.conceptId2 };
  }
}
