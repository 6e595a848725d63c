import type { PositionClass } from '../types/hypergraph';
import { debugLog, isGrundyTraceEnabled } from '../utils/envFlags';
import type { HypergraphState } from './HypergraphState';
import { mex } from './mex';

export interface GrundyCacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Memo table for Grundy values keyed by `HypergraphState.canonicalKey()`.
 *
 * Append-only with no eviction: a long-lived cache grows with every distinct
 * position it sees (at most 2^n per n-vertex starting position). Call
 * `clear()` between independent sessions.
 */
export class GrundyCache {
  private readonly values = new Map<string, number>();
  private hits = 0;
  private misses = 0;

  lookup(key: string): number | undefined {
    const value = this.values.get(key);
    if (value === undefined) {
      this.misses += 1;
    } else {
      this.hits += 1;
    }
    return value;
  }

  store(key: string, value: number): void {
    this.values.set(key, value);
  }

  clear(): void {
    this.values.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): GrundyCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.values.size };
  }
}

export interface GrundyEvaluatorOptions {
  /** Share a cache between evaluators. Defaults to a fresh one. */
  cache?: GrundyCache;
  /** Print one line per evaluated position. Defaults to HYPERNIM_GRUNDY_TRACE. */
  trace?: boolean;
}

/**
 * Sprague–Grundy valuation for the take-away game, where the only move is
 * deleting one vertex together with every edge and face incident to it.
 *
 * grundy(empty) = 0; otherwise grundy(s) = mex { grundy(s - v) : v in s }.
 * Successors are built from private copies, so the caller's state is never
 * mutated.
 */
export class GrundyEvaluator {
  readonly cache: GrundyCache;
  private readonly trace: boolean;

  constructor(options: GrundyEvaluatorOptions = {}) {
    this.cache = options.cache ?? new GrundyCache();
    this.trace = options.trace ?? isGrundyTraceEnabled();
  }

  grundy(state: HypergraphState): number {
    const key = state.canonicalKey();
    const cached = this.cache.lookup(key);
    if (cached !== undefined) {
      return cached;
    }

    let value = 0;
    if (!state.isEmpty()) {
      const reachable = new Set<number>();
      for (const v of state.vertexIterationOrder()) {
        const successor = state.copy();
        successor.removeVertex(v);
        reachable.add(this.grundy(successor));
      }
      value = mex(reachable);
    }

    this.cache.store(key, value);
    debugLog(this.trace, '[Grundy]', state.toString(), '=>', value);
    return value;
  }

  /**
   * Value of a position as the nim-sum of its connected components. A move
   * only ever touches one component, so this always equals `grundy(state)`
   * while evaluating far fewer distinct positions on split boards.
   */
  grundyOfSum(state: HypergraphState): number {
    let total = 0;
    for (const component of state.getComponents()) {
      total ^= this.grundy(component);
    }
    return total;
  }

  classify(state: HypergraphState): PositionClass {
    return this.grundy(state) === 0 ? 'P' : 'N';
  }

  clearCache(): void {
    this.cache.clear();
  }
}
