/**
 * CardBinController - Card number state behind a card number field.
 *
 * Tracks the typed number, guesses the brand locally and notifies its
 * delegate of BIN changes through its own throttler, so a fast typist
 * triggers one BIN lookup per pause instead of one per keystroke.
 *
 * The delegate is held weakly, and the throttled work only reaches the
 * controller through a `WeakRef`, so a pending notification never keeps
 * either of them alive.
 */

import type { BinLookupResponse, CardBinConfig, CardBinDelegate } from '../types';
import { binOf, detectCardBrand, sanitizeCardNumber } from './cardNumber';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { Throttler, weakWork } from './Throttler';

export class CardBinController {
  private config: Required<CardBinConfig>;
  private throttler: Throttler;
  private delegateRef: WeakRef<CardBinDelegate> | null = null;
  private number = '';
  private bin = '';
  private brands: string[];
  private log: Logger;

  constructor(config: CardBinConfig) {
    this.config = {
      supportedBrands: [...config.supportedBrands],
      throttleMs: config.throttleMs ?? 500,
      maxBrandsVisible: config.maxBrandsVisible ?? 4,
      debug: config.debug || false
    };
    this.throttler = new Throttler({
      minimumDelayMs: this.config.throttleMs,
      debug: this.config.debug
    });
    this.log = createLogger(this.config.debug, 'card');
    this.brands = this.topBrands;
  }

  get delegate(): CardBinDelegate | null {
    return this.delegateRef?.deref() ?? null;
  }

  set delegate(delegate: CardBinDelegate | null) {
    this.delegateRef = delegate ? new WeakRef(delegate) : null;
  }

  get supportedBrands(): string[] {
    return [...this.config.supportedBrands];
  }

  /** Supported brands shown while no number has been typed. */
  get topBrands(): string[] {
    return this.config.supportedBrands.slice(0, this.config.maxBrandsVisible);
  }

  get cardNumber(): string {
    return this.number;
  }

  get currentBin(): string {
    return this.bin;
  }

  /** Local brand guess, empty when unknown or not supported. */
  get selectedBrand(): string {
    const brand = detectCardBrand(this.number);
    return this.config.supportedBrands.includes(brand) ? brand : '';
  }

  /** Brand logos to display next to the field. */
  get visibleBrands(): string[] {
    return [...this.brands];
  }

  /**
   * Takes the raw field value. When the BIN changed, the delegate is told
   * once changes have been quiet for the throttle delay.
   */
  setCardNumber(value: string): void {
    this.number = sanitizeCardNumber(value);

    const bin = binOf(this.number);
    if (bin === this.bin) return;

    this.bin = bin;
    this.log('BIN changed:', bin);
    this.throttler.throttle(weakWork(this, controller => controller.delegate?.didChangeBin(bin)));
  }

  /**
   * Applies a BIN lookup result: the top supported brands while the number
   * is empty, the looked-up brands when the service found some, none otherwise.
   */
  update(binInfo: BinLookupResponse): string[] {
    if (this.number === '') {
      this.brands = this.topBrands;
    } else if (binInfo.brands) {
      this.brands = binInfo.brands.map(brand => brand.type);
    } else {
      this.brands = [];
    }
    return this.visibleBrands;
  }

  /** Stops pending notifications. */
  dispose(): void {
    this.throttler.dispose();
    this.delegateRef = null;
  }
}
