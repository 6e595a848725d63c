import type { HypergraphSnapshot, Vertex } from '../types/hypergraph';
import { EngineErrorCode, ValidationError } from './errors';

/**
 * Canonical order for vertices: numbers before strings, numbers ascending,
 * strings by code unit. Every ordered view of a position (identity key,
 * display string, snapshot, components) goes through this comparator so the
 * output never depends on insertion order.
 */
export function compareVertices(a: Vertex, b: Vertex): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Lexicographic order over canonically sorted member lists. */
export function compareMemberLists(a: readonly Vertex[], b: readonly Vertex[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i += 1) {
    const cmp = compareVertices(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}

function sortedMembers(members: Iterable<Vertex>): Vertex[] {
  return Array.from(new Set(members)).sort(compareVertices);
}

// JSON keeps 1 and '1' apart, which String() would not.
function memberKey(sorted: readonly Vertex[]): string {
  return JSON.stringify(sorted);
}

function formatSet(items: string[]): string {
  return `{${items.join(', ')}}`;
}

function formatMembers(members: readonly Vertex[]): string {
  return formatSet(members.map((v) => String(v)));
}

/**
 * Compact 16-hex-char string hash. Not cryptographic; equal inputs always
 * produce equal output on every host.
 */
export function simpleHash(str: string): string {
  let h1 = 0xdeadbeef | 0;
  let h2 = 0x41c6ce57 | 0;

  for (let i = 0; i < str.length; i += 1) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761) | 0;
    h2 = Math.imul(h2 ^ ch, 1597334677) | 0;
  }

  h1 = (Math.imul(h1 ^ (h1 >>> 16), 2246822507) ^ Math.imul(h2 ^ (h2 >>> 13), 3266489909)) | 0;
  h2 = (Math.imul(h2 ^ (h2 >>> 16), 2246822507) ^ Math.imul(h1 ^ (h1 >>> 13), 3266489909)) | 0;

  const hiHex = (h2 >>> 0).toString(16).padStart(8, '0');
  const loHex = (h1 >>> 0).toString(16).padStart(8, '0');
  return hiHex + loHex;
}

/**
 * Mutable take-away position: a vertex set, 2-vertex edges and faces of
 * three or more vertices.
 *
 * Invariants:
 * - every edge/face member is a vertex of the position (checked on insert);
 * - removing a vertex removes every edge and face that contains it;
 * - equality and `canonicalKey()` depend only on the three member sets.
 *
 * Edges and faces are stored keyed by their sorted member list, so a second
 * insert of the same member set is a no-op.
 */
export class HypergraphState {
  private readonly vertexSet = new Set<Vertex>();
  private readonly edgeMap = new Map<string, readonly Vertex[]>();
  private readonly faceMap = new Map<string, readonly Vertex[]>();

  static fromSnapshot(snapshot: HypergraphSnapshot): HypergraphState {
    const state = new HypergraphState();
    for (const v of snapshot.vertices) state.addVertex(v);
    for (const e of snapshot.edges) state.addEdge(e);
    for (const f of snapshot.faces) state.addFace(f);
    return state;
  }

  // ---------------------------------------------------------------------------
  // Insertion
  // ---------------------------------------------------------------------------

  /** Throws ValidationError for NaN and infinities, which have no canonical key. */
  addVertex(v: Vertex): void {
    if (typeof v === 'number' && !Number.isFinite(v)) {
      throw new ValidationError(
        EngineErrorCode.VALIDATION_INVALID_VERTEX,
        `Vertex must be a string or a finite number, got ${String(v)}.`,
        { vertex: String(v) }
      );
    }
    this.vertexSet.add(v);
  }

  addEdge(members: Iterable<Vertex>): void {
    const sorted = sortedMembers(members);
    if (sorted.length !== 2) {
      throw new ValidationError(
        EngineErrorCode.VALIDATION_EDGE_ARITY,
        'Edge must connect exactly two vertices.',
        { members: sorted, size: sorted.length }
      );
    }
    this.assertKnownVertices(sorted, 'edge');
    this.edgeMap.set(memberKey(sorted), sorted);
  }

  addFace(members: Iterable<Vertex>): void {
    const sorted = sortedMembers(members);
    this.assertKnownVertices(sorted, 'face');
    if (sorted.length < 3) {
      throw new ValidationError(
        EngineErrorCode.VALIDATION_FACE_ARITY,
        'Face must contain at least three vertices.',
        { members: sorted, size: sorted.length }
      );
    }
    this.faceMap.set(memberKey(sorted), sorted);
  }

  private assertKnownVertices(members: readonly Vertex[], kind: 'edge' | 'face'): void {
    const missing = members.filter((v) => !this.vertexSet.has(v));
    if (missing.length > 0) {
      throw new ValidationError(
        EngineErrorCode.VALIDATION_UNKNOWN_VERTEX,
        `Cannot add ${kind}: unknown vertex ${missing.map((v) => String(v)).join(', ')}.`,
        { kind, members, missing }
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Removal (always permissive)
  // ---------------------------------------------------------------------------

  /** Removes `v` and every edge and face containing it. */
  removeVertex(v: Vertex): void {
    if (!this.vertexSet.delete(v)) {
      return;
    }
    for (const [key, members] of this.edgeMap) {
      if (members.includes(v)) this.edgeMap.delete(key);
    }
    for (const [key, members] of this.faceMap) {
      if (members.includes(v)) this.faceMap.delete(key);
    }
  }

  removeEdge(members: Iterable<Vertex>): void {
    this.edgeMap.delete(memberKey(sortedMembers(members)));
  }

  removeFace(members: Iterable<Vertex>): void {
    this.faceMap.delete(memberKey(sortedMembers(members)));
  }

  /**
   * Removes every face that contains all of `members`, plus the exact edge
   * when `members` has two vertices.
   */
  removeHyperedge(members: Iterable<Vertex>): void {
    const sorted = sortedMembers(members);
    for (const [key, face] of this.faceMap) {
      if (sorted.every((v) => face.includes(v))) {
        this.faceMap.delete(key);
      }
    }
    if (sorted.length === 2) {
      this.edgeMap.delete(memberKey(sorted));
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  isEmpty(): boolean {
    return this.vertexSet.size === 0;
  }

  get vertexCount(): number {
    return this.vertexSet.size;
  }

  hasVertex(v: Vertex): boolean {
    return this.vertexSet.has(v);
  }

  hasEdge(members: Iterable<Vertex>): boolean {
    return this.edgeMap.has(memberKey(sortedMembers(members)));
  }

  hasFace(members: Iterable<Vertex>): boolean {
    return this.faceMap.has(memberKey(sortedMembers(members)));
  }

  /**
   * Vertices in insertion order. This is the move-generation order used by
   * the evaluator and tree builder; it is not part of the identity contract.
   */
  vertexIterationOrder(): Vertex[] {
    return Array.from(this.vertexSet);
  }

  vertices(): Vertex[] {
    return Array.from(this.vertexSet).sort(compareVertices);
  }

  edges(): Vertex[][] {
    return Array.from(this.edgeMap.values(), (e) => [...e]).sort(compareMemberLists);
  }

  faces(): Vertex[][] {
    return Array.from(this.faceMap.values(), (f) => [...f]).sort(compareMemberLists);
  }

  // ---------------------------------------------------------------------------
  // Copying and identity
  // ---------------------------------------------------------------------------

  copy(): HypergraphState {
    const clone = new HypergraphState();
    for (const v of this.vertexSet) clone.vertexSet.add(v);
    for (const [key, members] of this.edgeMap) clone.edgeMap.set(key, [...members]);
    for (const [key, members] of this.faceMap) clone.faceMap.set(key, [...members]);
    return clone;
  }

  toSnapshot(): HypergraphSnapshot {
    return { vertices: this.vertices(), edges: this.edges(), faces: this.faces() };
  }

  /**
   * Order-independent structural identity. Two states have the same key iff
   * their vertex, edge and face sets are equal.
   */
  canonicalKey(): string {
    return JSON.stringify([this.vertices(), this.edges(), this.faces()]);
  }

  hashCode(): string {
    return simpleHash(this.canonicalKey());
  }

  equals(other: HypergraphState): boolean {
    return this.canonicalKey() === other.canonicalKey();
  }

  /**
   * Display form: `V: {a, b} | E: {{a, b}} | F: {}`. Vertices print unquoted,
   * so `1` and `'1'` look alike here; use `canonicalKey()` to tell them apart.
   */
  toString(): string {
    const v = formatMembers(this.vertices());
    const e = formatSet(this.edges().map(formatMembers));
    const f = formatSet(this.faces().map(formatMembers));
    return `V: ${v} | E: ${e} | F: ${f}`;
  }

  // ---------------------------------------------------------------------------
  // Components
  // ---------------------------------------------------------------------------

  /**
   * Splits the position into maximal connected sub-positions. Two vertices
   * are connected when they share an edge or a face. Components are ordered
   * by their smallest vertex; each keeps exactly the edges and faces lying
   * inside it.
   */
  getComponents(): HypergraphState[] {
    const adjacency = new Map<Vertex, Set<Vertex>>();
    for (const v of this.vertexSet) {
      adjacency.set(v, new Set());
    }
    const link = (members: readonly Vertex[]): void => {
      for (const a of members) {
        const neighbours = adjacency.get(a);
        if (!neighbours) continue;
        for (const b of members) {
          if (a !== b) neighbours.add(b);
        }
      }
    };
    for (const members of this.edgeMap.values()) link(members);
    for (const members of this.faceMap.values()) link(members);

    const componentOf = new Map<Vertex, HypergraphState>();
    const components: HypergraphState[] = [];

    for (const start of this.vertices()) {
      if (componentOf.has(start)) continue;

      const component = new HypergraphState();
      components.push(component);

      const queue: Vertex[] = [start];
      componentOf.set(start, component);
      while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        component.vertexSet.add(current);
        for (const next of adjacency.get(current) ?? []) {
          if (!componentOf.has(next)) {
            componentOf.set(next, component);
            queue.push(next);
          }
        }
      }
    }

    // Every member of a connected edge/face sits in the same component, so
    // the first member decides where it goes.
    for (const [key, members] of this.edgeMap) {
      componentOf.get(members[0])?.edgeMap.set(key, [...members]);
    }
    for (const [key, members] of this.faceMap) {
      componentOf.get(members[0])?.faceMap.set(key, [...members]);
    }

    return components;
  }
}
