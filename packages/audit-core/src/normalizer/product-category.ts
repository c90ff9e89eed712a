import type { ProductCategory } from '../types/index.js';

/**
 * Substring rules, checked in order; the first hit decides.
 * "manger plus" is a misspelling found in real plan names.
 */
const CATEGORY_RULES: ReadonlyArray<{
  category: ProductCategory;
  needles: readonly string[];
}> = [
  { category: 'Firmendaten Manager Basic', needles: ['basic'] },
  { category: 'Firmendaten Manager Plus', needles: ['plus', 'manger plus'] },
  { category: 'Firmendaten Manager PRO', needles: ['pro'] },
];

/**
 * Derive the product category from a plan name (case-insensitive).
 */
export function categorizeProduct(planName: string | null | undefined): ProductCategory {
  const plan = planName?.trim().toLowerCase() ?? '';
  if (plan === '') {
    return 'Unbekannt';
  }

  const rule = CATEGORY_RULES.find((r) => r.needles.some((needle) => plan.includes(needle)));
  return rule?.category ?? 'Sonstige';
}
