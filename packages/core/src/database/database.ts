// Linking index - a two-way join between NEOs and their close approaches
import type { IndexStats } from '@neoscope/shared';
import type { CloseApproach } from '../models/approach.js';
import type { NearEarthObject } from '../models/neo.js';
import { DuplicateDesignationError } from './errors.js';

/**
 * A close approach together with the NEO its designation resolved to.
 * `neo` is null when no NEO in the index carries that designation.
 */
export interface LinkedApproach {
  readonly approach: CloseApproach;
  readonly neo: NearEarthObject | null;
}

/**
 * One-argument predicate over linked approaches; a filter set is a list of these
 */
export type ApproachPredicate = (approach: LinkedApproach) => boolean;

/**
 * NEODatabase holds NEOs and close approaches in flat arrays ("slots") and links
 * them by slot number: each approach slot records the slot of its NEO, and each
 * NEO slot records the slots of its approaches. Lookups by designation and by
 * name go through maps from key to NEO slot.
 *
 * Designation and name lookups are exact and case-sensitive.
 *
 * The index is built once in the constructor and never mutated afterwards, so
 * any number of queries may read it.
 */
export class NEODatabase {
  private readonly neos: readonly NearEarthObject[];
  private readonly linked: readonly LinkedApproach[];
  private readonly neoSlotByDesignation = new Map<string, number>();
  private readonly neoSlotByName = new Map<string, number>();
  private readonly approachSlotsByNeo: number[][];
  private readonly unresolvedSlots: number[] = [];

  /**
   * @throws {DuplicateDesignationError} When two NEOs share a designation
   */
  constructor(
    neos: Iterable<NearEarthObject>,
    approaches: Iterable<CloseApproach>,
  ) {
    this.neos = [...neos];
    this.approachSlotsByNeo = this.neos.map(() => []);

    this.neos.forEach((neo, slot) => {
      if (this.neoSlotByDesignation.has(neo.designation)) {
        throw new DuplicateDesignationError(neo.designation);
      }
      this.neoSlotByDesignation.set(neo.designation, slot);

      // First NEO wins when names collide
      if (neo.name && !this.neoSlotByName.has(neo.name)) {
        this.neoSlotByName.set(neo.name, slot);
      }
    });

    const linked: LinkedApproach[] = [];
    for (const approach of approaches) {
      const approachSlot = linked.length;
      const neoSlot = this.neoSlotByDesignation.get(approach.designation);

      if (neoSlot === undefined) {
        this.unresolvedSlots.push(approachSlot);
        linked.push(Object.freeze({ approach, neo: null }));
        continue;
      }

      this.approachSlotsByNeo[neoSlot].push(approachSlot);
      linked.push(Object.freeze({ approach, neo: this.neos[neoSlot] }));
    }
    this.linked = linked;
  }

  /**
   * Find an NEO by its primary designation, or null when there is none
   */
  getNeoByDesignation(designation: string): NearEarthObject | null {
    const slot = this.neoSlotByDesignation.get(designation);
    return slot === undefined ? null : this.neos[slot];
  }

  /**
   * Find an NEO by its IAU name, or null when there is none.
   * No NEO is indexed under an empty or absent name.
   */
  getNeoByName(name: string | null | undefined): NearEarthObject | null {
    if (!name) return null;
    const slot = this.neoSlotByName.get(name);
    return slot === undefined ? null : this.neos[slot];
  }

  /**
   * Close approaches of an NEO held by this index, in source order
   */
  getApproaches(neo: NearEarthObject): LinkedApproach[] {
    const slot = this.neoSlotByDesignation.get(neo.designation);
    if (slot === undefined || this.neos[slot] !== neo) return [];
    return this.approachSlotsByNeo[slot].map((s) => this.linked[s]);
  }

  /**
   * Generate the approaches that satisfy every predicate, in source order.
   * An empty filter set matches every approach.
   */
  *query(
    filters: readonly ApproachPredicate[] = [],
  ): Generator<LinkedApproach, void, undefined> {
    for (const approach of this.linked) {
      if (filters.every((filter) => filter(approach))) {
        yield approach;
      }
    }
  }

  /**
   * Approaches whose designation matched no NEO, in source order
   */
  unresolvedApproaches(): LinkedApproach[] {
    return this.unresolvedSlots.map((slot) => this.linked[slot]);
  }

  /**
   * Every NEO held by the index, in source order
   */
  allNeos(): readonly NearEarthObject[] {
    return this.neos;
  }

  stats(): IndexStats {
    return {
      neoCount: this.neos.length,
      namedNeoCount: this.neoSlotByName.size,
      approachCount: this.linked.length,
      unresolvedCount: this.unresolvedSlots.length,
    };
  }
}
