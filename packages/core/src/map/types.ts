export interface PathfindingOptions {
  // Nodes whose accumulated cost would exceed this are never discovered (movement budgets)
  maxCost?: number;
  // Checked once per expansion; an aborted search yields no path
  signal?: AbortSignal;
}

export type PathFailureReason = 'unreachable' | 'aborted';

export interface PathResult<C> {
  success: boolean;
  path: C[];
  cost: number;
  reason?: PathFailureReason;
}

export interface PathfindNode<C> {
  totalCost: number;
  predecessor?: C;
}
