/**
 * SectionedListReconciler - Owns a list of sections and keeps its diffable
 * snapshot in step with it.
 *
 * Every mutation goes through one commit step that prunes empty sections,
 * diffs the working snapshot against the committed one and hands the host
 * a single transaction to animate.
 *
 * @example
 * ```typescript
 * const list = new SectionedListReconciler({
 *   onTransaction: (tx) => view.animate(tx),
 *   onEditingChange: (editing) => view.setEditing(editing),
 * });
 *
 * list.reload([
 *   { id: 'stored', header: { title: 'Stored cards', editingStyle: 'delete' }, items: storedCards },
 *   { id: 'regular', items: paymentMethods },
 * ]);
 *
 * // user swiped to delete the first stored card
 * list.deleteItem({ section: 0, item: 0 });
 * ```
 */

import type { IndexPath, ListItem, ListSection, ListTransaction, ReconcilerConfig } from '../types';
import { IndexOutOfRangeError } from './errors';
import { diffSnapshots } from './ListDiff';
import { ListSnapshot } from './ListSnapshot';
import { createLogger } from './logger';
import type { Logger } from './logger';

export class SectionedListReconciler<Item extends ListItem = ListItem> {
  private config: Required<ReconcilerConfig>;
  private committed: ListSection<Item>[] = [];
  private snapshot = new ListSnapshot();
  private loadingItems = new Set<string>();
  private editing = false;
  private log: Logger;

  constructor(config: ReconcilerConfig = {}) {
    this.config = {
      onTransaction: config.onTransaction || (() => {}),
      onEditingChange: config.onEditingChange || (() => {}),
      debug: config.debug || false
    };
    this.log = createLogger(this.config.debug, 'list');
  }

  /**
   * Replaces the whole list. Sections without items are dropped.
   *
   * Item ids must be unique across `newSections`, a duplicate throws
   * `DuplicateItemError` and leaves the committed list untouched.
   */
  reload(newSections: ReadonlyArray<ListSection<Item>>): ListTransaction {
    const sections = newSections.filter(section => section.items.length > 0).map(copySection);
    const working = ListSnapshot.fromSections(sections);

    this.log('Reloading', sections.length, 'sections');
    return this.commit(sections, working);
  }

  /**
   * Deletes one row. The section it leaves empty is deleted with it,
   * in the same transaction.
   */
  deleteItem(at: IndexPath): ListTransaction {
    const deleted = this.item(at);

    const sections = this.committed.map(copySection);
    sections[at.section].items.splice(at.item, 1);

    const working = this.snapshot.clone();
    working.deleteItems([deleted.id]);

    this.log('Deleting item', deleted.id);
    return this.commit(sections, working);
  }

  /**
   * True when at least one section has a header whose editing style is not 'none'.
   */
  get isEditable(): boolean {
    return this.committed.some(section => isEditableSection(section));
  }

  get isEditing(): boolean {
    return this.editing;
  }

  /** Turning edit mode on is ignored while no section is editable. */
  setEditing(editing: boolean): void {
    if (editing && !this.isEditable) {
      this.log('Ignoring edit mode, no editable section');
      return;
    }
    if (editing === this.editing) return;

    this.editing = editing;
    this.config.onEditingChange(editing);
  }

  canEditRow(at: IndexPath): boolean {
    this.item(at);
    return isEditableSection(this.committed[at.section]);
  }

  get numberOfSections(): number {
    return this.committed.length;
  }

  get sections(): ReadonlyArray<ListSection<Item>> {
    return this.committed.map(copySection);
  }

  rowCount(section: number): number {
    return this.requireSection(section).items.length;
  }

  section(index: number): ListSection<Item> {
    return copySection(this.requireSection(index));
  }

  item(at: IndexPath): Item {
    const { items } = this.requireSection(at.section);
    if (!Number.isInteger(at.item) || at.item < 0 || at.item >= items.length) {
      throw new IndexOutOfRangeError(
        `Item ${at.item} out of range in section ${at.section} (${items.length} items)`
      );
    }
    return items[at.item];
  }

  /** Where an item currently sits, null once it left the list. */
  indexPathOf(item: Item): IndexPath | null {
    return this.snapshot.indexPathOf(item.id);
  }

  /** Current diffable mirror of the committed list. */
  currentSnapshot(): ListSnapshot {
    return this.snapshot.clone();
  }

  private requireSection(index: number): ListSection<Item> {
    if (!Number.isInteger(index) || index < 0 || index >= this.committed.length) {
      throw new IndexOutOfRangeError(
        `Section ${index} out of range (${this.committed.length} sections)`
      );
    }
    return this.committed[index];
  }

  /** Marks an item as loading. Does not produce a transaction. */
  startLoading(item: Item): void {
    this.loadingItems.add(item.id);
  }

  /** Clears every loading marker. */
  stopLoading(): void {
    this.loadingItems.clear();
  }

  isLoading(item: Item): boolean {
    return this.loadingItems.has(item.id);
  }

  private commit(sections: ListSection<Item>[], working: ListSnapshot): ListTransaction {
    const emptySections = sections.filter(section => section.items.length === 0);
    working.deleteSections(emptySections.map(section => section.id));

    const transaction = diffSnapshots(this.snapshot, working);

    this.committed = sections.filter(section => section.items.length > 0);
    this.snapshot = working;

    this.config.onTransaction(transaction);

    if (!this.isEditable) {
      this.setEditing(false);
    }

    return transaction;
  }
}

function copySection<Item extends ListItem>(section: ListSection<Item>): ListSection<Item> {
  return { ...section, items: [...section.items] };
}

function isEditableSection(section: ListSection): boolean {
  return section.header !== undefined && section.header.editingStyle !== 'none';
}
