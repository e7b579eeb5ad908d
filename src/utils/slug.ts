import { POST_RULES } from '@/config/businessRules';

/**
 * Turn a post title into its url name
 *
 * "Midsummer Party 2024!" → "midsummer-party-2024"
 * Anything that slugs to nothing becomes "new-untitled-post".
 */
export function titleToUrlName(title: string | null | undefined): string {
  const slug = (title ?? '')
    .toLowerCase()
    .trim()
    .replace(/\s+/g, '-')
    .replace(/[^0-9a-z-]/g, '');

  return slug === '' ? POST_RULES.UNTITLED_URL_NAME : slug;
}

/**
 * Make a url name unique given how many posts already use it
 * (either exactly or as a "-n" suffixed variant)
 */
export function withUniqueSuffix(urlName: string, existingCount: number): string {
  return existingCount > 0 ? `${urlName}-${existingCount + 1}` : urlName;
}

/**
 * Escape LIKE wildcards so a url name can be used as a literal prefix
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
