/**
 * Text helpers shared by the classifier, router, planner and synthesizer
 */

/**
 * Lowercase and reduce to space-separated word tokens ("Node.js" → "node js")
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}+#]+/gu, " ")
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized ? normalized.split(" ") : [];
}

/**
 * Terms (single words or phrases) that occur as whole words in already
 * normalized text, in lexicon order, without duplicates
 */
export function matchTerms(normalized: string, terms: readonly string[]): string[] {
  const haystack = ` ${normalized} `;
  const found = new Set<string>();

  for (const term of terms) {
    const needle = normalizeText(term);
    if (needle && haystack.includes(` ${needle} `)) {
      found.add(needle);
    }
  }

  return [...found];
}

/**
 * Key for grouping claims on the same sub-question
 */
export function normalizeTopic(topic: string): string {
  return topic
    .toLowerCase()
    .trim()
    .replace(/\s+/g, " ")
    .replace(/[?.!:;,]+$/, "");
}

/**
 * ASCII slug: diacritics are dropped, anything else outside [a-z0-9]
 * separates words ("Café au lait" → "cafe-au-lait"; "寿司" → "")
 */
export function slugify(text: string, maxLength = 40): string {
  return text
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+/, "")
    .slice(0, maxLength)
    .replace(/-+$/, "");
}

export function truncate(text: string, maxLength: number): string {
  const clean = text.trim().replace(/\s+/g, " ");
  return clean.length <= maxLength ? clean : `${clean.slice(0, maxLength - 1).trimEnd()}…`;
}

export function unique<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}

/**
 * "A", "A and B", "A, B and C"
 */
export function listPhrase(items: readonly string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}

/**
 * Replace {name} placeholders; unknown names are left as they are
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, name: string) => values[name] ?? match);
}
