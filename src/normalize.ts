/**
 * Canonical comparison key for identifiers: internal whitespace collapsed,
 * trimmed, uppercased. Signing, verification and row matching all go through
 * this function; changing it invalidates every token already issued.
 */
export function normalizeIdentifier(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).trim().split(/\s+/).filter(Boolean).join(' ').toUpperCase();
}

export function stripDiacritics(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

/**
 * Header cells are compared like identifiers, with accents removed as well
 * ("HABILITACIÓN" matches "Habilitacion").
 */
export function normalizeHeader(value: unknown): string {
  return stripDiacritics(normalizeIdentifier(value));
}
