/**
 * Checkout Components JavaScript SDK
 *
 * Sectioned payment method lists with minimal diff transactions, and card
 * number fields with throttled BIN lookups.
 *
 * @example
 * ```typescript
 * import { SectionedListReconciler, Throttler } from 'checkout-components-js';
 *
 * const list = new SectionedListReconciler({
 *   onTransaction: (tx) => animate(tx)
 * });
 * list.reload(sections);
 *
 * const throttler = new Throttler({ minimumDelayMs: 500 });
 * throttler.throttle(() => lookupBin(bin));
 * ```
 */

export { SectionedListReconciler } from './core/SectionedListReconciler';
export { ListSnapshot } from './core/ListSnapshot';
export type { SnapshotSection } from './core/ListSnapshot';
export {
  diffSnapshots,
  applyTransaction,
  emptyTransaction,
  isEmptyTransaction,
  longestIncreasingSubsequence
} from './core/ListDiff';
export { Throttler, weakWork } from './core/Throttler';
export type { Work } from './core/Throttler';
export { CardBinController } from './core/CardBinController';
export { BIN_LENGTH, binOf, detectCardBrand, formatCardNumber, sanitizeCardNumber } from './core/cardNumber';
export {
  ComponentError,
  IndexOutOfRangeError,
  InvalidConfigurationError,
  DuplicateItemError,
  DuplicateSectionError,
  RequestError,
  toPaymentError
} from './core/errors';
export { createLogger } from './core/logger';
export type { Logger } from './core/logger';

// Adapters
export { BinLookupAdapter } from './adapters/BinLookupAdapter';
export { fetchClientKey, clearClientKeyCache, clientKeyPath } from './crypto/clientKey';

// React
export { PaymentMethodList } from './components/PaymentMethodList';
export type { PaymentMethodListProps } from './components/PaymentMethodList';
export { CardNumberField } from './components/CardNumberField';
export type { CardNumberFieldProps } from './components/CardNumberField';
export { useListReconciler } from './components/useListReconciler';
export type { ListReconcilerState, UseListReconcilerOptions } from './components/useListReconciler';
export { useCardBin } from './components/useCardBin';
export type { CardBinState, UseCardBinOptions } from './components/useCardBin';

// Types
export type {
  EditingStyle,
  ListSectionHeader,
  ListItem,
  ListSection,
  IndexPath,
  SectionChange,
  SectionMove,
  ItemChange,
  ItemMove,
  ListTransaction,
  ReconcilerConfig,
  ThrottlerConfig,
  PaymentError,
  CardBrand,
  BinLookupResponse,
  ClientKeyResponse,
  ApiConfig,
  BinLookupService,
  CardBinConfig,
  CardBinDelegate
} from './types';

// Version
export const VERSION = '0.1.0';
