import type { IndexPath, ListSection } from '../types';
import { ComponentError, DuplicateItemError, DuplicateSectionError } from './errors';

export interface SnapshotSection {
  id: string;
  itemIds: string[];
}

/**
 * Diffable mirror of a sectioned list: section ids in order, and the
 * ordered item ids of each section. Item ids are unique across the snapshot.
 */
export class ListSnapshot {
  private sectionOrder: string[] = [];
  private itemsBySection = new Map<string, string[]>();
  private sectionByItem = new Map<string, string>();

  /** Builds a snapshot by appending the sections, then each section's items. */
  static fromSections(sections: ReadonlyArray<ListSection>): ListSnapshot {
    const snapshot = new ListSnapshot();
    snapshot.appendSections(sections.map(section => section.id));
    for (const section of sections) {
      snapshot.appendItems(section.items.map(item => item.id), section.id);
    }
    return snapshot;
  }

  static fromJSON(sections: ReadonlyArray<SnapshotSection>): ListSnapshot {
    const snapshot = new ListSnapshot();
    snapshot.appendSections(sections.map(section => section.id));
    for (const section of sections) {
      snapshot.appendItems(section.itemIds, section.id);
    }
    return snapshot;
  }

  get sectionIds(): string[] {
    return [...this.sectionOrder];
  }

  get numberOfSections(): number {
    return this.sectionOrder.length;
  }

  get numberOfItems(): number {
    return this.sectionByItem.size;
  }

  itemIds(sectionId: string): string[] {
    return [...this.requireSection(sectionId)];
  }

  hasSection(sectionId: string): boolean {
    return this.itemsBySection.has(sectionId);
  }

  hasItem(itemId: string): boolean {
    return this.sectionByItem.has(itemId);
  }

  sectionOf(itemId: string): string | undefined {
    return this.sectionByItem.get(itemId);
  }

  indexOfSection(sectionId: string): number {
    return this.sectionOrder.indexOf(sectionId);
  }

  indexPathOf(itemId: string): IndexPath | null {
    const sectionId = this.sectionByItem.get(itemId);
    if (sectionId === undefined) return null;
    return {
      section: this.sectionOrder.indexOf(sectionId),
      item: this.requireSection(sectionId).indexOf(itemId)
    };
  }

  appendSections(sectionIds: ReadonlyArray<string>): void {
    for (const id of sectionIds) {
      if (this.itemsBySection.has(id)) {
        throw new DuplicateSectionError(id);
      }
      this.sectionOrder.push(id);
      this.itemsBySection.set(id, []);
    }
  }

  appendItems(itemIds: ReadonlyArray<string>, sectionId: string): void {
    const items = this.requireSection(sectionId);
    for (const id of itemIds) {
      if (this.sectionByItem.has(id)) {
        throw new DuplicateItemError(id);
      }
      items.push(id);
      this.sectionByItem.set(id, sectionId);
    }
  }

  /** Ids that are not in the snapshot are ignored. */
  deleteItems(itemIds: ReadonlyArray<string>): void {
    for (const id of itemIds) {
      const sectionId = this.sectionByItem.get(id);
      if (sectionId === undefined) continue;
      const items = this.requireSection(sectionId);
      items.splice(items.indexOf(id), 1);
      this.sectionByItem.delete(id);
    }
  }

  /** Removes the sections together with their items. */
  deleteSections(sectionIds: ReadonlyArray<string>): void {
    for (const id of sectionIds) {
      const items = this.itemsBySection.get(id);
      if (!items) continue;
      for (const itemId of items) {
        this.sectionByItem.delete(itemId);
      }
      this.itemsBySection.delete(id);
      this.sectionOrder.splice(this.sectionOrder.indexOf(id), 1);
    }
  }

  clone(): ListSnapshot {
    return ListSnapshot.fromJSON(this.toJSON());
  }

  toJSON(): SnapshotSection[] {
    return this.sectionOrder.map(id => ({ id, itemIds: this.itemIds(id) }));
  }

  private requireSection(sectionId: string): string[] {
    const items = this.itemsBySection.get(sectionId);
    if (!items) {
      throw new ComponentError('UNKNOWN_SECTION', `Section not in snapshot: ${sectionId}`);
    }
    return items;
  }
}
