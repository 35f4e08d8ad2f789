/**
 * core/catalog.ts
 *
 * The ordered, immutable set of tweaks. Declaration order is display order,
 * and the engine runs a batch in this order whatever order the ids were
 * selected in.
 */

import { CATEGORIES, Tweak, TweakCategory } from './types';
import { CatalogError } from './errors';

export class TweakCatalog {
  private readonly tweaks: readonly Tweak[];

  /** id → position in declaration order */
  private readonly index = new Map<string, number>();

  constructor(tweaks: Tweak[]) {
    tweaks.forEach((tweak, i) => {
      if (this.index.has(tweak.id)) {
        throw new CatalogError(`Duplicate tweak id "${tweak.id}"`, { tweakId: tweak.id });
      }
      this.index.set(tweak.id, i);
    });
    this.tweaks = Object.freeze(tweaks.map(t => Object.freeze({ ...t })));
  }

  list(): readonly Tweak[] {
    return this.tweaks;
  }

  get(id: string): Tweak | undefined {
    const i = this.index.get(id);
    return i === undefined ? undefined : this.tweaks[i];
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  /** Position in declaration order, or -1. */
  indexOf(id: string): number {
    return this.index.get(id) ?? -1;
  }

  get size(): number {
    return this.tweaks.length;
  }

  /** Tweaks grouped by category, categories in their fixed display order. */
  byCategory(): Array<{ category: TweakCategory; tweaks: Tweak[] }> {
    return CATEGORIES
      .map(category => ({ category, tweaks: this.tweaks.filter(t => t.category === category) }))
      .filter(group => group.tweaks.length > 0);
  }
}
