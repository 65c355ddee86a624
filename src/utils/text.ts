const MULTI_SPACE_REGEX = /\s+/g;
const NON_ALNUM_REGEX = /[^a-z0-9]+/g;

export const collapseWhitespace = (value: string): string => value.trim().replace(MULTI_SPACE_REGEX, ' ');

/** `"Rent Amount:"`, `rent-amount` and `RENT_AMOUNT` all become `rent_amount`. */
export const canonicalKey = (value: string): string =>
  value
    .normalize('NFKC')
    .toLowerCase()
    .replace(NON_ALNUM_REGEX, '_')
    .replace(/^_+|_+$/g, '');

const buildBigrams = (value: string): Set<string> => {
  const compact = canonicalKey(value).replace(/_/g, '');
  if (compact.length <= 1) {
    return new Set(compact.length === 0 ? [] : [compact]);
  }

  const bigrams = new Set<string>();
  for (let index = 0; index < compact.length - 1; index += 1) {
    bigrams.add(compact.slice(index, index + 2));
  }
  return bigrams;
};

export const diceCoefficient = (left: string, right: string): number => {
  const leftSet = buildBigrams(left);
  const rightSet = buildBigrams(right);

  if (leftSet.size === 0 && rightSet.size === 0) {
    return 1;
  }
  if (leftSet.size === 0 || rightSet.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const token of leftSet) {
    if (rightSet.has(token)) {
      intersection += 1;
    }
  }

  return (2 * intersection) / (leftSet.size + rightSet.size);
};
