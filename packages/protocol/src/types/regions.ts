// Region types - the columns of the price sheet

/**
 * Recognized regions, in the order their columns appear in the sheet.
 */
export const REGIONS = [
  'Nationally',
  'Dublin',
  'Cork',
  'Galway',
  'Limerick',
  'Waterford',
  'Other_counties',
] as const;

export type Region = (typeof REGIONS)[number];

/**
 * Column headers of the sheet, in order.
 */
export const SHEET_COLUMNS = ['Year', 'Quarter', ...REGIONS] as const;

export type SheetColumn = (typeof SHEET_COLUMNS)[number];

/**
 * Check if a string names a recognized region (case-sensitive).
 */
export function isRegion(value: string): value is Region {
  return (REGIONS as readonly string[]).includes(value);
}
