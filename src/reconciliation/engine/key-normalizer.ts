/**
 * Canonical form of a product identifier, used only for matching.
 * `toUpperCase` applies the locale-independent Unicode mapping.
 */
export function normalizeKey(raw: string): string {
  return raw.trim().toUpperCase();
}
