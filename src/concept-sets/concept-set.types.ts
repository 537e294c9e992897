export interface ConceptSetItem {
  conceptId: number;
  conceptName?: string;
  excluded: boolean;
  includeDescendants: boolean;
  includeMapped: boolean;
}

export type OptimizationStatus = 'ok' | 'unavailable';
export type OptimizationStrategy = 'bottom_up' | 'top_down' | 'none';

export interface OptimizationResult {
  status: OptimizationStatus;
  strategy: OptimizationStrategy;
  optimizedItems: ConceptSetItem[];
  removedItems: ConceptSetItem[];
  addedItems: ConceptSetItem[];
  removedCount: number;
  // bottom-up passes that changed the set
  passes: number;
  iterationLimitReached: boolean;
  error?: string;
}
