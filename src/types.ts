/**
 * Editing style of a list section header.
 * Rows of a section whose header style is not 'none' can be deleted.
 */
export type EditingStyle = 'none' | 'delete';

/**
 * List Section Header
 */
export interface ListSectionHeader {
  /** Header title */
  title: string;

  /** Whether rows of this section can be deleted */
  editingStyle: EditingStyle;
}

/**
 * List Item
 *
 * `id` is the item identity used for diffing, it must be unique within a list.
 */
export interface ListItem {
  /** Stable identifier */
  id: string;

  /** Title shown on the row */
  title: string;

  /** Secondary line (e.g., card expiry) */
  subtitle?: string;

  /** Brand or method logo URL */
  imageUrl?: string;
}

/**
 * List Section
 */
export interface ListSection<Item extends ListItem = ListItem> {
  /** Stable identifier */
  id: string;

  /** Items in display order */
  items: Item[];

  /** Optional header, its editing style decides if rows can be deleted */
  header?: ListSectionHeader;
}

/**
 * Position of a row in the list
 */
export interface IndexPath {
  section: number;
  item: number;
}

export interface SectionChange {
  id: string;
  index: number;
}

export interface SectionMove {
  id: string;
  from: number;
  to: number;
}

export interface ItemChange {
  id: string;
  at: IndexPath;
}

export interface ItemMove {
  id: string;
  from: IndexPath;
  to: IndexPath;
}

/**
 * List Transaction
 *
 * The edit script that turns the previous snapshot into the next one.
 * Deletions and move sources are indexed against the previous snapshot,
 * insertions and move destinations against the next one.
 *
 * Items of a deleted section are also listed in `deletedItems`, and items of
 * an inserted section in `insertedItems`. A host that animates whole
 * sections must skip those entries rather than apply both.
 */
export interface ListTransaction {
  deletedSections: SectionChange[];
  insertedSections: SectionChange[];
  movedSections: SectionMove[];
  deletedItems: ItemChange[];
  insertedItems: ItemChange[];
  movedItems: ItemMove[];
}

/**
 * Reconciler Configuration
 */
export interface ReconcilerConfig {
  /** Called with every transaction produced by `reload` or `deleteItem` */
  onTransaction?: (transaction: ListTransaction) => void;

  /** Called when edit mode is switched on or off */
  onEditingChange?: (editing: boolean) => void;

  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Throttler Configuration
 */
export interface ThrottlerConfig {
  /** Minimum delay between two executions, in milliseconds */
  minimumDelayMs: number;

  /** Called when a throttled work item throws */
  onError?: (error: unknown) => void;

  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Payment Error
 */
export interface PaymentError {
  /** Error code */
  code: string;

  /** Human-readable message */
  message: string;

  /** Field with error (if applicable) */
  field?: string;

  /** Original error */
  cause?: unknown;
}

/**
 * Card brand as returned by the BIN lookup service
 */
export interface CardBrand {
  /** Brand type (e.g., 'visa', 'mc', 'amex') */
  type: string;

  /** Whether the brand is supported for this payment */
  supported?: boolean;
}

/**
 * BIN Lookup Response
 */
export interface BinLookupResponse {
  /** Detected brands, absent when the service could not tell */
  brands?: CardBrand[];

  /** Request identifier echoed back by the service */
  requestId?: string;
}

/**
 * Client Key Response
 */
export interface ClientKeyResponse {
  /** Public key used to encrypt card details */
  cardPublicKey: string;
}

/**
 * API Configuration shared by the HTTP adapters
 */
export interface ApiConfig {
  /** Client key issued for this integration */
  clientKey: string;

  /** Checkout API base URL */
  apiUrl: string;

  /** Enable debug logging */
  debug?: boolean;
}

/**
 * BIN Lookup Service
 * Implemented by the HTTP adapter, or by a stub in tests.
 */
export interface BinLookupService {
  lookup(bin: string, supportedBrands: string[]): Promise<BinLookupResponse>;
}

/**
 * Card BIN Controller Configuration
 */
export interface CardBinConfig {
  /** Card brands accepted for this payment, in display priority order */
  supportedBrands: string[];

  /** Delay between BIN notifications (default: 500) */
  throttleMs?: number;

  /** Maximum number of logos shown while the number is empty (default: 4) */
  maxBrandsVisible?: number;

  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Receives throttled BIN changes. Held weakly by the card BIN controller.
 */
export interface CardBinDelegate {
  didChangeBin(bin: string): void;
}
