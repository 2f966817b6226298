/**
 * Normalizes a card name for indexed lookups and file names.
 *
 * Lowercases, keeps ASCII letters and digits, turns spaces, hyphens and
 * underscores into the separator, drops every other character, collapses
 * repeated separators and trims them from both ends.
 */
export const slugify = (value: string | null | undefined, separator: "_" | "-" = "_"): string => {
  if (!value) return "";
  let out = "";
  for (const char of value.normalize("NFKD").toLowerCase()) {
    if ((char >= "a" && char <= "z") || (char >= "0" && char <= "9")) {
      out += char;
    } else if (char === " " || char === "-" || char === "_") {
      out += separator;
    }
  }
  const repeated = new RegExp(`\\${separator}+`, "g");
  const edges = new RegExp(`^\\${separator}|\\${separator}$`, "g");
  return out.replace(repeated, separator).replace(edges, "");
};

export const fileSlug = (value: string | null | undefined): string => slugify(value, "-");
