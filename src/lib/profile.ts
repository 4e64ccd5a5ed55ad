import assert from 'node:assert/strict';

export enum PrinterModel {
  P950NW = 'P950NW',
  PT9800PCN = '9800PCN',
}

// Dots per stripe on 18mm tape ("height" in Brother's manuals)
const STRIPE_SIZE: Record<PrinterModel, number> = {
  [PrinterModel.P950NW]: 408,
  [PrinterModel.PT9800PCN]: 312,
};

export const DEFAULT_STRIPE_SIZE = STRIPE_SIZE[PrinterModel.P950NW];

const PRINTER_MODELS: readonly string[] = Object.values(PrinterModel);

export function isPrinterModel(value: unknown): value is PrinterModel {
  return typeof value === 'string' && PRINTER_MODELS.includes(value);
}

/**
 * Number of dots in one stripe for the given model. Unknown or missing
 * identifiers (including the detector's `'unknown'` and `'error'` results)
 * fall back to the P950NW geometry.
 */
export function resolveStripeSize(model?: string | null) {
  const stripeSize = isPrinterModel(model)
    ? STRIPE_SIZE[model]
    : DEFAULT_STRIPE_SIZE;

  assert(stripeSize % 8 === 0, `Stripe size ${stripeSize} is not byte aligned`);

  return stripeSize;
}
