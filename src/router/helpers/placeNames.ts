/**
 * Place-name text helpers
 */

export function stripDiacritics(text: string): string {
  return text.normalize('NFKD').replace(/[\u0300-\u036f]/g, '');
}

/**
 * Normalize LGU text for tolerant matching: no diacritics, lowercase, no
 * "city of"/"municipality" prefixes, letters/digits/spaces only.
 *   "CITY OF PARAÑAQUE" -> "paranaque"
 */
export function normalizeLguText(text: string): string {
  return stripDiacritics(text)
    .toLowerCase()
    .replace(/[^\x20-\x7e]/g, '')
    .replace(/\b(city of|municipality of|municipality|city)\b/g, ' ')
    .replace(/[^a-z0-9\s-]/g, ' ')
    .replace(/-/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** "SAN JOSE DEL MONTE" -> "San Jose Del Monte" */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, sep: string, letter: string) => sep + letter.toUpperCase());
}

/**
 * Render a municipality for display:
 *   "CITY OF PARAÑAQUE, METROPOLITAN MANILA" -> "Parañaque City, Metro Manila"
 */
export function displayMunicipality(name: string): string {
  const parts = name.trim().split(',').map(part => part.trim());
  const city = parts[0];
  const rest = parts.slice(1).join(', ').replace(/\bMETROPOLITAN MANILA\b/gi, 'Metro Manila');
  let cityDisplay = titleCase(city.replace(/^CITY OF\s+/i, ''));
  if (/^CITY OF\s+/i.test(city)) cityDisplay = `${cityDisplay} City`;
  return `${cityDisplay}, ${rest}`.replace(/^[,\s]+|[,\s]+$/g, '');
}
