/**
 * React component listing payment methods in sections.
 *
 * Sections whose header allows deletion (e.g. stored cards) get an
 * Edit toggle and per-row delete buttons. Selecting a row marks it as
 * loading until `loading` goes back to false.
 *
 * @example
 * ```tsx
 * <PaymentMethodList
 *   sections={[
 *     { id: 'stored', header: { title: 'Stored cards', editingStyle: 'delete' }, items: storedCards },
 *     { id: 'other', header: { title: 'Pay with', editingStyle: 'none' }, items: methods }
 *   ]}
 *   loading={submitting}
 *   onSelect={(item) => startPayment(item.id)}
 *   onDelete={(item) => api.disableStoredCard(item.id)}
 * />
 * ```
 */

import { useEffect, useState } from 'react';
import { toPaymentError } from '../core/errors';
import type { ListItem, ListSection, ListTransaction, PaymentError } from '../types';
import { useListReconciler } from './useListReconciler';

export interface PaymentMethodListProps<Item extends ListItem = ListItem> {
  /** Sections to display, empty ones are hidden */
  sections: ReadonlyArray<ListSection<Item>>;

  /** Whether a selected payment is in progress */
  loading?: boolean;

  /** Callback when a row is selected */
  onSelect: (item: Item) => void;

  /** Called before a row is removed, a rejection keeps the row */
  onDelete?: (item: Item) => void | Promise<void>;

  /** Callback on error */
  onError?: (error: PaymentError) => void;

  /** Called with each list transaction */
  onTransaction?: (transaction: ListTransaction) => void;

  /** Custom class name */
  className?: string;

  /** Debug mode */
  debug?: boolean;
}

export function PaymentMethodList<Item extends ListItem = ListItem>({
  sections,
  loading = false,
  onSelect,
  onDelete,
  onError,
  onTransaction,
  className,
  debug = false
}: PaymentMethodListProps<Item>) {
  const list = useListReconciler(sections, { onTransaction, debug });
  const [deleting, setDeleting] = useState<string | null>(null);
  const { stopLoading } = list;

  useEffect(() => {
    if (!loading) {
      stopLoading();
    }
  }, [loading, stopLoading]);

  function select(item: Item) {
    if (loading || list.isEditing) return;
    list.startLoading(item);
    onSelect(item);
  }

  async function remove(item: Item) {
    setDeleting(item.id);
    try {
      await onDelete?.(item);
      list.deleteItem(item);
    } catch (err) {
      onError?.(toPaymentError(err, 'DELETE_ERROR', 'Failed to remove payment method'));
    } finally {
      setDeleting(null);
    }
  }

  return (
    <div className={className}>
      {list.isEditable && (
        <button type="button" onClick={() => list.setEditing(!list.isEditing)}>
          {list.isEditing ? 'Done' : 'Edit'}
        </button>
      )}

      {list.sections.map((section, sectionIndex) => (
        <section key={section.id} aria-label={section.header?.title ?? section.id}>
          {section.header && <h3>{section.header.title}</h3>}

          <ul>
            {section.items.map((item, itemIndex) => {
              const isLoading = list.isLoading(item);
              const canDelete = list.isEditing && list.canEditRow({ section: sectionIndex, item: itemIndex });

              return (
                <li key={item.id} aria-busy={isLoading}>
                  <button type="button" disabled={loading} onClick={() => select(item)}>
                    {item.imageUrl && <img src={item.imageUrl} alt="" />}
                    <span>{item.title}</span>
                    {item.subtitle && <small>{item.subtitle}</small>}
                  </button>

                  {isLoading && <span role="status">Loading {item.title}</span>}

                  {canDelete && (
                    <button
                      type="button"
                      aria-label={`Delete ${item.title}`}
                      disabled={deleting === item.id}
                      onClick={() => void remove(item)}
                    >
                      Delete
                    </button>
                  )}
                </li>
              );
            })}
          </ul>
        </section>
      ))}
    </div>
  );
}
