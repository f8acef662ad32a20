/**
 * Human readable label for a column name: `_` and `-` become spaces and every
 * word is capitalized, e.g. `Transaction_amount` → `Transaction Amount`.
 */
export const formatFieldLabel = (field: string): string =>
  field
    .split(/[_-]+/)
    .filter((word) => word !== '')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');

/**
 * `"<Label> (<suffix>)"`, or just the label when there is no suffix.
 */
export const formatColorbarTitle = (field: string, suffix: string): string => {
  const label = formatFieldLabel(field);
  return suffix.trim() === '' ? label : `${label} (${suffix})`;
};
