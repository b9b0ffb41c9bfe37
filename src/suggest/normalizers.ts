/**
 * Field name normalization steps
 *
 * Registry of named, pure string → string steps. The suggestion pipeline runs
 * them in a fixed order; every step is idempotent, so normalizing an already
 * normalized name returns it unchanged.
 */

export type NormalizerStep = (name: string, options: NormalizeOptions) => string;

export interface NormalizeOptions {
  reorderNameQualifiers?: boolean;           // "First name" → "Name First"
  nameQualifiers?: readonly string[];        // default: first, last, middle, full
  abbreviations?: Readonly<Record<string, string>>;
}

export const DEFAULT_NAME_QUALIFIERS: readonly string[] = ['first', 'last', 'middle', 'full'];

/**
 * Abbreviations expanded as whole words (case-insensitive, optional trailing dot)
 */
export const DEFAULT_ABBREVIATIONS: Readonly<Record<string, string>> = {
  acct: 'Account',
  addr: 'Address',
  amt: 'Amount',
  avg: 'Average',
  cat: 'Category',
  cnt: 'Count',
  cust: 'Customer',
  dept: 'Department',
  desc: 'Description',
  id: 'ID',
  mgr: 'Manager',
  num: 'Number',
  org: 'Organization',
  pct: 'Percent',
  prod: 'Product',
  qtr: 'Quarter',
  qty: 'Quantity',
  yr: 'Year',
  ytd: 'YTD'
};

const MINOR_WORDS = new Set(['a', 'an', 'and', 'as', 'at', 'by', 'for', 'in', 'of', 'on', 'or', 'per', 'the', 'to', 'vs']);

const STEP_REGISTRY: Record<string, NormalizerStep> = {};

function registerStep(name: string, fn: NormalizerStep): void {
  STEP_REGISTRY[name] = fn;
}

/**
 * Get a step by name
 *
 * @throws Error if the step is not registered
 */
export function getStep(name: string): NormalizerStep {
  const step = STEP_REGISTRY[name];
  if (!step) {
    throw new Error(`Unknown normalizer step: ${name}. Available: ${listSteps().join(', ')}`);
  }
  return step;
}

export function listSteps(): string[] {
  return Object.keys(STEP_REGISTRY).sort();
}

// ============================================================================
// Built-in Steps
// ============================================================================

/**
 * trim: "  Order Date  " → "Order Date"
 */
registerStep('trim', name => name.trim());

/**
 * underscores_to_spaces: "order_date" → "order date"
 */
registerStep('underscores_to_spaces', name => name.replace(/_+/g, ' ').trim());

/**
 * collapse_whitespace: "Order    Date" → "Order Date"
 */
registerStep('collapse_whitespace', name => name.replace(/\s+/g, ' '));

/**
 * expand_abbreviations: "Order Qty" → "Order Quantity", "cust. id" → "Customer ID"
 */
registerStep('expand_abbreviations', (name, options) => {
  const dictionary = options.abbreviations ?? DEFAULT_ABBREVIATIONS;
  return name
    .split(' ')
    .map(word => {
      const lower = word.toLowerCase();
      const key = lower.endsWith('.') ? lower.slice(0, -1) : lower;
      return dictionary[key] ?? word;
    })
    .join(' ');
});

/**
 * title_case: "order date of sale" → "Order Date of Sale"
 *
 * Words with inner capitals (ID, iPhone) are left alone; all-caps words of
 * five or more letters are treated as shouting and title-cased.
 */
registerStep('title_case', name =>
  name
    .split(' ')
    .map((word, index) => titleCaseWord(word, index))
    .join(' ')
);

/**
 * reorder_name_qualifiers: "First name" → "name First" (opt-in)
 *
 * Runs before title_case so a swapped minor word is capitalized in the same pass.
 */
registerStep('reorder_name_qualifiers', (name, options) => {
  if (!options.reorderNameQualifiers) return name;
  const qualifiers = new Set((options.nameQualifiers ?? DEFAULT_NAME_QUALIFIERS).map(q => q.toLowerCase()));
  const words = name.split(' ');
  const [first, second] = words;
  if (words.length !== 2 || first === undefined || second === undefined) return name;
  // Two qualifiers would swap back and forth on every run
  if (!qualifiers.has(first.toLowerCase()) || qualifiers.has(second.toLowerCase())) return name;
  return `${second} ${first}`;
});

export const PIPELINE: readonly string[] = [
  'trim',
  'underscores_to_spaces',
  'collapse_whitespace',
  'expand_abbreviations',
  'reorder_name_qualifiers',
  'title_case'
];

export function normalizeFieldName(name: string, options: NormalizeOptions = {}): string {
  return PIPELINE.reduce((current, step) => getStep(step)(current, options), name);
}

function titleCaseWord(word: string, index: number): string {
  const lower = word.toLowerCase();
  if (index > 0 && MINOR_WORDS.has(lower)) return lower;

  const letters = word.replace(/[^A-Za-z]/g, '');
  if (letters.length >= 5 && letters === letters.toUpperCase()) return capitalize(lower);
  if (/[A-Z]/.test(word.slice(1))) return word;
  return capitalize(word);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
