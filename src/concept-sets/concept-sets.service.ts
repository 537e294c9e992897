import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import {
  AncestorRepository,
  ConceptRepository,
} from '../vocabulary/repositories';
import { VocabularyStoreService } from '../vocabulary/vocabulary-store.service';
import type {
  ConceptSetItem,
  OptimizationResult,
  OptimizationStrategy,
} from './concept-set.types';

export const MAX_BOTTOM_UP_PASSES = 10;

interface AncestorMatch {
  ancestorId: number;
  conceptName?: string;
  children: Set<number>;
}

interface SubstitutionPlan {
  accepted: AncestorMatch[];
  // member ids the accepted ancestors replace
  consumed: Set<number>;
}

interface Optimization {
  items: ConceptSetItem[];
  removed: ConceptSetItem[];
  added: ConceptSetItem[];
  passes: number;
  limitReached: boolean;
}

@Injectable()
export class ConceptSetsService {
  private readonly logger = new Logger(ConceptSetsService.name);

  constructor(
    private readonly store: VocabularyStoreService,
    private readonly conceptRepo: ConceptRepository,
    private readonly ancestorRepo: AncestorRepository,
  ) {}

  /**
   * Shrinks a concept set without changing the concepts it resolves to.
   * Bottom-up substitution is tried first; top-down pruning runs only when
   * bottom-up changed nothing.
   */
  async optimize(items: ConceptSetItem[]): Promise<OptimizationResult> {
    const input = items.map((item) => ({ ...item }));
    if (!this.store.isAvailable()) {
      this.logger.warn('Concept set optimization skipped: vocabulary not loaded');
      return unchanged(input, 'unavailable');
    }

    try {
      const bottomUp = await this.bottomUp(input);
      if (bottomUp.passes > 0) {
        return this.summarize(input, bottomUp, 'bottom_up');
      }

      const topDown = await this.topDown(input);
      if (topDown.length < input.length) {
        const kept = new Set(topDown);
        return this.summarize(
          input,
          {
            items: topDown,
            removed: input.filter((i) => !kept.has(i)),
            added: [],
            passes: 0,
            limitReached: false,
          },
          'top_down',
        );
      }
      return unchanged(input, 'ok');
    } catch (error) {
      this.logger.error(`Concept set optimization failed: ${errorMessage(error)}`);
      return { ...unchanged(input, 'unavailable'), error: errorMessage(error) };
    }
  }

  // ============================================
  // 1. BOTTOM-UP (ancestor substitution)
  // ============================================

  /**
   * Substitution passes until nothing changes or the pass limit is hit.
   * Removed and added items accumulate over all passes, so an ancestor added
   * in one pass and replaced in a later one shows in both lists.
   */
  private async bottomUp(input: ConceptSetItem[]): Promise<Optimization> {
    const removed: ConceptSetItem[] = [];
    const added: ConceptSetItem[] = [];
    let items = input;
    let passes = 0;

    while (passes < MAX_BOTTOM_UP_PASSES) {
      const plan = await this.findSubstitutions(items);
      if (!plan) {
        return { items, removed, added, passes, limitReached: false };
      }
      const step = applySubstitutions(items, plan);
      items = step.items;
      removed.push(...step.removed);
      added.push(...step.added);
      passes++;
      this.logger.debug(
        `Bottom-up pass ${passes} replaced ${step.removed.length} items with ${step.added.length} ancestors`,
      );
    }

    // The limit only counts as reached when another pass would still change the set
    const limitReached = (await this.findSubstitutions(items)) !== null;
    if (limitReached) {
      this.logger.warn(
        `Bottom-up optimization stopped after ${MAX_BOTTOM_UP_PASSES} passes`,
      );
    }
    return { items, removed, added, passes, limitReached };
  }

  /** Ancestors one pass would substitute; null when nothing can be replaced. */
  private async findSubstitutions(
    items: ConceptSetItem[],
  ): Promise<SubstitutionPlan | null> {
    const active = items.filter((i) => !i.excluded);
    const memberIds = [...new Set(active.map((i) => i.conceptId))];
    const expandedIds = active
      .filter((i) => i.includeDescendants)
      .map((i) => i.conceptId);
    const presentIds = new Set(items.map((i) => i.conceptId));

    // 1. Ancestors above at least two members, not in the set yet
    const children = new Map<number, Set<number>>();
    for (const pair of await this.ancestorRepo.findAncestorPairs(memberIds)) {
      if (presentIds.has(pair.ancestorId)) continue;
      const set = children.get(pair.ancestorId) ?? new Set<number>();
      set.add(pair.descendantId);
      children.set(pair.ancestorId, set);
    }
    const grouped = [...children.entries()].filter(([, c]) => c.size >= 2);
    if (grouped.length === 0) return null;

    const concepts = await this.conceptRepo.findByIds(grouped.map(([id]) => id));
    const candidates = grouped.filter(([id]) => concepts.get(id)?.valid === true);
    if (candidates.length === 0) return null;

    // 2. Keep ancestors whose every descendant is covered by the set
    const candidateIds = candidates.map(([id]) => id);
    const [totals, covered] = await Promise.all([
      this.ancestorRepo.countDescendants(candidateIds),
      this.ancestorRepo.countCoveredDescendants(candidateIds, memberIds, expandedIds),
    ]);
    const matches: AncestorMatch[] = candidates
      .filter(([id]) => {
        const total = totals.get(id) ?? 0;
        return total > 0 && covered.get(id) === total;
      })
      .map(([ancestorId, set]) => ({
        ancestorId,
        conceptName: concepts.get(ancestorId)?.conceptName,
        children: set,
      }))
      .sort(
        (a, b) => b.children.size - a.children.size || a.ancestorId - b.ancestorId,
      );

    // 3. Larger matches claim their children first
    const consumed = new Set<number>();
    const accepted: AncestorMatch[] = [];
    for (const match of matches) {
      if ([...match.children].some((id) => consumed.has(id))) continue;
      match.children.forEach((id) => consumed.add(id));
      accepted.push(match);
    }
    return accepted.length > 0 ? { accepted, consumed } : null;
  }

  // ============================================
  // 2. TOP-DOWN (redundant descendant pruning)
  // ============================================

  private async topDown(items: ConceptSetItem[]): Promise<ConceptSetItem[]> {
    const active = items.filter((i) => !i.excluded);
    const expanded = [
      ...new Set(active.filter((i) => i.includeDescendants).map((i) => i.conceptId)),
    ];
    if (expanded.length === 0) return items;

    const memberIds = active.map((i) => i.conceptId);
    const below = new Map<number, number[]>();
    for (const pair of await this.ancestorRepo.findDescendantPairs(expanded, memberIds)) {
      if (pair.ancestorId === pair.descendantId) continue;
      const list = below.get(pair.ancestorId) ?? [];
      list.push(pair.descendantId);
      below.set(pair.ancestorId, list);
    }

    // An item already pruned does not prune others (keeps one of a cycle)
    const redundant = new Set<number>();
    for (const ancestorId of expanded) {
      if (redundant.has(ancestorId)) continue;
      for (const id of below.get(ancestorId) ?? []) {
        if (id !== ancestorId) redundant.add(id);
      }
    }

    return items.filter((i) => i.excluded || !redundant.has(i.conceptId));
  }

  private summarize(
    input: ConceptSetItem[],
    outcome: Optimization,
    strategy: OptimizationStrategy,
  ): OptimizationResult {
    this.logger.log(
      `Concept set optimized (${strategy}): ${input.length} -> ${outcome.items.length} items`,
    );
    return {
      status: 'ok',
      strategy,
      optimizedItems: outcome.items,
      removedItems: outcome.removed,
      addedItems: outcome.added,
      removedCount: outcome.removed.length,
      passes: outcome.passes,
      iterationLimitReached: outcome.limitReached,
    };
  }
}

function applySubstitutions(
  items: ConceptSetItem[],
  plan: SubstitutionPlan,
): { items: ConceptSetItem[]; removed: ConceptSetItem[]; added: ConceptSetItem[] } {
  const replaced = (i: ConceptSetItem) => !i.excluded && plan.consumed.has(i.conceptId);
  const added = plan.accepted.map(
    ({ ancestorId, conceptName }): ConceptSetItem => ({
      conceptId: ancestorId,
      conceptName,
      excluded: false,
      includeDescendants: true,
      includeMapped: false,
    }),
  );
  return {
    items: [...items.filter((i) => !replaced(i)), ...added],
    removed: items.filter(replaced),
    added,
  };
}

function unchanged(
  items: ConceptSetItem[],
  status: OptimizationResult['status'],
): OptimizationResult {
  return {
    status,
    strategy: 'none',
    optimizedItems: items,
    removedItems: [],
    addedItems: [],
    removedCount: 0,
    passes: 0,
    iterationLimitReached: false,
  };
}
