export interface ParsedTypeLine {
  /** Supertypes and card types, lowercased, e.g. ["basic", "snow", "land"]. */
  types: string[];
  /** Subtypes as printed, e.g. ["Forest"]. */
  subtypes: string[];
}

const EMPTY: ParsedTypeLine = { types: [], subtypes: [] };

/** First face of a `Front // Back` type line. */
export const frontFace = (typeLine: string | null | undefined): string => {
  if (!typeLine) return "";
  const [front = ""] = typeLine.split(" // ");
  return front.trim();
};

export const parseTypeLine = (typeLine: string | null | undefined): ParsedTypeLine => {
  const front = frontFace(typeLine);
  if (!front) return EMPTY;

  const dash = front.includes("—") ? "—" : front.includes(" - ") ? " - " : null;
  const [left, right = ""] = dash ? front.split(dash, 2) : [front];

  const words = (value: string) => value.split(/\s+/).filter((word) => word.length > 0);
  return {
    types: words(left).map((word) => word.toLowerCase()),
    subtypes: words(right),
  };
};

export const hasType = (typeLine: string | null | undefined, type: string): boolean =>
  parseTypeLine(typeLine).types.includes(type.toLowerCase());

/** True when any face of the type line carries the card type. */
export const anyFaceHasType = (typeLine: string | null | undefined, type: string): boolean => {
  if (!typeLine) return false;
  return typeLine.split(" // ").some((face) => hasType(face, type));
};
