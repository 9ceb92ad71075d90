/**
 * Property categories: a fixed set of tags plus an open `Other` variant
 * carrying a free-form label.
 */
export type PropertyCategory =
  | { kind: "RealEstate" }
  | { kind: "Car" }
  | { kind: "Art" }
  | { kind: "Other"; label: string };

export type PropertyCategoryKind = PropertyCategory["kind"];

export const PROPERTY_CATEGORY_KINDS: readonly PropertyCategoryKind[] = [
  "RealEstate",
  "Car",
  "Art",
  "Other",
];

export const PropertyCategories = {
  realEstate: (): PropertyCategory => ({ kind: "RealEstate" }),
  car: (): PropertyCategory => ({ kind: "Car" }),
  art: (): PropertyCategory => ({ kind: "Art" }),
  other: (label: string): PropertyCategory => ({ kind: "Other", label }),
};

/**
 * Human-readable rendering used in listings.
 *
 * Fixed tags render as their name; the open variant renders as
 * `Other("label")` with the label escaped as a string literal.
 */
export function formatCategory(category: PropertyCategory): string {
  switch (category.kind) {
    case "Other":
      return `Other(${JSON.stringify(category.label)})`;
    default:
      return category.kind;
  }
}

export function categoriesEqual(
  a: PropertyCategory,
  b: PropertyCategory,
): boolean {
  if (a.kind === "Other" && b.kind === "Other") {
    return a.label === b.label;
  }
  return a.kind === b.kind;
}

export function cloneCategory(category: PropertyCategory): PropertyCategory {
  return { ...category };
}
