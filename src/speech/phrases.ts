import phrases from "../../resources/phrases.json";

export type PhraseKey = keyof typeof phrases;

/**
 * Fills `{name}` placeholders of a phrase from `values`. Unknown placeholders are left as-is.
 */
export function phrase(key: PhraseKey, values: Record<string, string | number> = {}): string {
  return phrases[key].replace(/\{(\w+)\}/g, (match, name: string) =>
    name in values ? String(values[name]) : match,
  );
}
