/**
 * Word-level transforms used to turn class-like segments into path segments
 */

const IRREGULAR_SINGULARS: Record<string, string> = {
  people: "person",
  men: "man",
  women: "woman",
  children: "child",
  mice: "mouse",
  geese: "goose",
  feet: "foot",
  teeth: "tooth",
  quizzes: "quiz",
  heroes: "hero",
  echoes: "echo",
  potatoes: "potato",
  tomatoes: "tomato",
  // same in both forms
  series: "series",
  species: "species",
};

/**
 * Lower-case a segment, separating words with underscores.
 * e.g. MyAdminSection -> my_admin_section, HTMLPages -> html_pages, V1 -> v1
 */
export function underscore(word: string): string {
  return word
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z\d])([A-Z])/g, "$1_$2")
    .replace(/-/g, "_")
    .toLowerCase();
}

/**
 * PascalCase a file or directory name.
 * e.g. my_admin_section -> MyAdminSection, api-keys -> ApiKeys
 */
export function camelize(word: string): string {
  return word
    .split(/[_\-\s]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/**
 * Singular form of an underscored segment. Only the last word changes:
 * admin_projects -> admin_project.
 */
export function singularize(word: string): string {
  const cut = word.lastIndexOf("_");
  const head = cut === -1 ? "" : word.slice(0, cut + 1);
  const last = cut === -1 ? word : word.slice(cut + 1);
  return head + singularizeWord(last);
}

function singularizeWord(word: string): string {
  const lower = word.toLowerCase();
  const irregular = IRREGULAR_SINGULARS[lower];
  if (irregular !== undefined) return irregular;

  if (lower.length > 3 && lower.endsWith("ies")) {
    return word.slice(0, -3) + "y";
  }
  if (/(ss|x|z|ch|sh)es$/.test(lower)) {
    return word.slice(0, -2);
  }
  // statuses -> status, buses -> bus (but houses -> house)
  if (/[^aeiou]uses$/.test(lower)) {
    return word.slice(0, -2);
  }
  if (lower.endsWith("ss") || lower.endsWith("us")) {
    return word;
  }
  if (lower.length > 1 && lower.endsWith("s")) {
    return word.slice(0, -1);
  }
  return word;
}
