/**
 * React card number field.
 *
 * Formats the number as it is typed, shows the brand logos and looks the
 * BIN up once typing pauses for the throttle delay.
 *
 * @example
 * ```tsx
 * const binLookup = new BinLookupAdapter({ clientKey, apiUrl });
 *
 * <CardNumberField
 *   supportedBrands={['visa', 'mc', 'amex', 'elo']}
 *   binLookup={binLookup}
 *   onChange={(number, brand) => setCard({ number, brand })}
 * />
 * ```
 */

import { formatCardNumber } from '../core/cardNumber';
import type { BinLookupService, PaymentError } from '../types';
import { useCardBin } from './useCardBin';

export interface CardNumberFieldProps {
  /** Card brands accepted for this payment, in display priority order */
  supportedBrands: string[];

  /** Service answering BIN lookups */
  binLookup: BinLookupService;

  /** Field label */
  label?: string;

  /** Delay between BIN lookups (default: 500) */
  throttleMs?: number;

  /** Callback when the number changes, with the local brand guess */
  onChange?: (number: string, brand: string) => void;

  /** Callback on error */
  onError?: (error: PaymentError) => void;

  /** Custom class name */
  className?: string;

  /** Debug mode */
  debug?: boolean;
}

export function CardNumberField({
  supportedBrands,
  binLookup,
  label = 'Card number',
  throttleMs,
  onChange,
  onError,
  className,
  debug = false
}: CardNumberFieldProps) {
  const card = useCardBin({ supportedBrands, binLookup, throttleMs, onError, debug });

  return (
    <div className={className}>
      <label>
        {label}
        <input
          type="text"
          inputMode="numeric"
          placeholder="0000 0000 0000 0000"
          autoComplete="cc-number"
          value={formatCardNumber(card.number)}
          onChange={(event) => {
            const { number, brand } = card.setCardNumber(event.target.value);
            onChange?.(number, brand);
          }}
        />
      </label>

      <ul aria-label="Card brands">
        {card.brands.map(brand => (
          <li key={brand}>{brand.toUpperCase()}</li>
        ))}
      </ul>
    </div>
  );
}
