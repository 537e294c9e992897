import { Injectable, Logger } from '@nestjs/common';
import { errorMessage, StoreUnavailableError } from '../common/errors';
import { compareText, MAX_LABEL_LENGTH, truncateLabel } from '../common/text';
import {
  AncestorRepository,
  ClosureConcept,
  ConceptRepository,
  RelationshipRepository,
} from '../vocabulary/repositories';
import type { VocabularyConcept } from '../vocabulary/vocabulary.types';
import {
  DEFAULT_HIERARCHY_LEVELS,
  GraphEdgeDto,
  HierarchyGraphDto,
  HierarchyNodeCategory,
  HierarchyNodeDto,
} from './dto';

const emptyGraph = (): HierarchyGraphDto => ({
  nodes: [],
  edges: [],
  stats: {
    totalAncestors: 0,
    totalDescendants: 0,
    displayedAncestors: 0,
    displayedDescendants: 0,
  },
});

@Injectable()
export class GraphService {
  private readonly logger = new Logger(GraphService.name);

  constructor(
    private readonly conceptRepo: ConceptRepository,
    private readonly ancestorRepo: AncestorRepository,
    private readonly relationshipRepo: RelationshipRepository,
  ) {}

  // ============================================
  // HIERARCHY API
  // ============================================

  /**
   * Bounded ancestor/descendant view around one concept. Levels come from
   * the closure's minimum separation; edges are the hierarchical
   * relationships among the displayed concepts, oriented parent -> child.
   */
  async buildHierarchy(
    conceptId: number,
    maxLevelsUp = DEFAULT_HIERARCHY_LEVELS,
    maxLevelsDown = DEFAULT_HIERARCHY_LEVELS,
  ): Promise<HierarchyGraphDto> {
    try {
      return await this.collectHierarchy(conceptId, maxLevelsUp, maxLevelsDown);
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        this.logger.warn(`buildHierarchy: ${error.message}`);
      } else {
        this.logger.warn(`buildHierarchy(${conceptId}) failed: ${errorMessage(error)}`);
      }
      return emptyGraph();
    }
  }

  private async collectHierarchy(
    conceptId: number,
    maxLevelsUp: number,
    maxLevelsDown: number,
  ): Promise<HierarchyGraphDto> {
    const selected = await this.conceptRepo.findById(conceptId);
    if (!selected) return emptyGraph();

    const [ancestors, allDescendants] = await Promise.all([
      this.ancestorRepo.findClosureConcepts(conceptId, 'ancestors'),
      this.ancestorRepo.findClosureConcepts(conceptId, 'descendants'),
    ]);

    // Cyclic data: a concept on both sides stays an ancestor
    const ancestorIds = new Set(ancestors.map((a) => a.concept.conceptId));
    const descendants = allDescendants.filter(
      (d) => !ancestorIds.has(d.concept.conceptId),
    );

    const shownAncestors = ancestors
      .filter((a) => a.minSeparation <= maxLevelsUp)
      .sort(byLevelThenName);
    const shownDescendants = descendants
      .filter((d) => d.minSeparation <= maxLevelsDown)
      .sort(byLevelThenName);

    const nodes: HierarchyNodeDto[] = [
      toNode(selected, 0, 'selected'),
      ...shownAncestors.map((a) => toNode(a.concept, -a.minSeparation, 'ancestor')),
      ...shownDescendants.map((d) => toNode(d.concept, d.minSeparation, 'descendant')),
    ];

    return {
      nodes,
      edges: await this.orientedEdges(nodes.map((n) => n.id)),
      stats: {
        totalAncestors: ancestors.length,
        totalDescendants: descendants.length,
        displayedAncestors: shownAncestors.length,
        displayedDescendants: shownDescendants.length,
      },
    };
  }

  private async orientedEdges(conceptIds: number[]): Promise<GraphEdgeDto[]> {
    const resolver = await this.relationshipRepo.getDirectionResolver();
    const relationships = await this.relationshipRepo.findEdgesAmong(
      conceptIds,
      resolver.hierarchicalKinds,
    );

    // "parent->child" keys
    const seen = new Set<string>();
    const edges: GraphEdgeDto[] = [];
    for (const relationship of relationships) {
      const oriented = resolver.orient(relationship);
      if (!oriented || oriented.parentId === oriented.childId) continue;
      const key = `${oriented.parentId}->${oriented.childId}`;
      if (seen.has(key)) continue;
      seen.add(key);
      edges.push({ from: oriented.parentId, to: oriented.childId });
    }
    return edges.sort((a, b) => a.from - b.from || a.to - b.to);
  }
}

function byLevelThenName(a: ClosureConcept, b: ClosureConcept): number {
  return (
    a.minSeparation - b.minSeparation ||
    compareText(a.concept.conceptName, b.concept.conceptName) ||
    a.concept.conceptId - b.concept.conceptId
  );
}

function toNode(
  concept: VocabularyConcept,
  level: number,
  category: HierarchyNodeCategory,
): HierarchyNodeDto {
  return {
    id: concept.conceptId,
    label: truncateLabel(concept.conceptName, MAX_LABEL_LENGTH),
    // avoid -0 for zero-separation rows
    level: level === 0 ? 0 : level,
    category,
    conceptName: concept.conceptName,
    vocabularyId: concept.vocabularyId,
    conceptCode: concept.conceptCode,
    conceptClassId: concept.conceptClassId,
  };
}
