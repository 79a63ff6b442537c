/**
 * Endpoint naming
 *
 * The endpoint (ONU) name is a pure function of property + unit:
 *   ("350 S Harper", "1") -> "350-s-harper-1"
 */

function slug(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, '-');
}

export function deriveEndpointName(property: string, unit: string): string {
  return `${slug(property)}-${slug(unit)}`;
}

/**
 * Normalize a property name for comparison against inventory rows
 */
export function normalizeProperty(property: string): string {
  return slug(property);
}
