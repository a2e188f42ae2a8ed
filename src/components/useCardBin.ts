import { useEffect, useRef, useState } from 'react';
import { CardBinController } from '../core/CardBinController';
import { toPaymentError } from '../core/errors';
import type { BinLookupService, CardBinDelegate, PaymentError } from '../types';

export interface UseCardBinOptions {
  /** Card brands accepted for this payment, in display priority order */
  supportedBrands: string[];

  /** Service answering BIN lookups */
  binLookup: BinLookupService;

  /** Delay between BIN lookups (default: 500) */
  throttleMs?: number;

  /** Callback on lookup error */
  onError?: (error: PaymentError) => void;

  /** Debug mode */
  debug?: boolean;
}

export interface CardBinState {
  /** Digits typed so far */
  number: string;

  /** Brand logos to display */
  brands: string[];

  /** Local brand guess */
  selectedBrand: string;

  /** Takes the raw field value, returns the cleaned number and brand guess */
  setCardNumber: (value: string) => { number: string; brand: string };
}

/**
 * Card number state with throttled BIN lookups.
 * A controller is created on mount and disposed on unmount. A re-mount, as
 * StrictMode does, gets a fresh one.
 */
export function useCardBin({
  supportedBrands,
  binLookup,
  throttleMs,
  onError,
  debug = false
}: UseCardBinOptions): CardBinState {
  const controllerRef = useRef<CardBinController | null>(null);
  const getController = (): CardBinController => {
    if (!controllerRef.current) {
      controllerRef.current = new CardBinController({ supportedBrands, throttleMs, debug });
    }
    return controllerRef.current;
  };

  const [number, setNumber] = useState('');
  const [brands, setBrands] = useState(() => getController().visibleBrands);

  const binLookupRef = useRef(binLookup);
  binLookupRef.current = binLookup;
  const onErrorRef = useRef(onError);
  onErrorRef.current = onError;

  // The controller only holds its delegate weakly, the ref keeps it alive.
  const delegateRef = useRef<CardBinDelegate | null>(null);

  useEffect(() => {
    let mounted = true;
    const controller = getController();

    const delegate: CardBinDelegate = {
      didChangeBin: (bin) => {
        if (bin === '') {
          setBrands(controller.update({}));
          return;
        }

        binLookupRef.current
          .lookup(bin, controller.supportedBrands)
          .then((response) => {
            if (mounted && controller.currentBin === bin) {
              setBrands(controller.update(response));
            }
          })
          .catch((err: unknown) => {
            if (mounted) {
              onErrorRef.current?.(toPaymentError(err, 'BIN_LOOKUP_ERROR', 'Failed to look up card brand'));
            }
          });
      }
    };

    delegateRef.current = delegate;
    controller.delegate = delegate;

    return () => {
      mounted = false;
      controller.dispose();
      if (controllerRef.current === controller) {
        controllerRef.current = null;
      }
      delegateRef.current = null;
    };
    // Options are read once per controller.
  }, []);

  return {
    number,
    brands,
    selectedBrand: getController().selectedBrand,
    setCardNumber: (value: string) => {
      const controller = getController();
      controller.setCardNumber(value);
      setNumber(controller.cardNumber);
      return { number: controller.cardNumber, brand: controller.selectedBrand };
    }
  };
}
