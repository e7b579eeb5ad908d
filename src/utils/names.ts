function capitalize(word: string): string {
  const lower = word.toLowerCase();
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

/**
 * "aSTRID" + "LINDGREN" → "Astrid Lindgren"
 */
export function formatPersonName(firstName: string | null, lastName: string | null): string {
  return [firstName, lastName]
    .filter((part): part is string => Boolean(part && part.trim()))
    .map((part) => capitalize(part.trim()))
    .join(' ');
}
