import { PropertyCategory, cloneCategory } from "./category";

/**
 * A stored property entry
 */
export interface PropertyRecord {
  /** Caller-supplied key, equal to the key the record is stored under */
  id: string;
  category: PropertyCategory;
  /** Lowercase hex SHA-256 of the uploaded image */
  imageDigest: string;
  description: string;
  owner: string;
}

/**
 * One row of a registry listing
 */
export interface PropertySummary {
  id: string;
  /** Display rendering of the category, e.g. `Car` or `Other("boat")` */
  categoryName: string;
  imageDigest: string;
}

export function cloneRecord(record: PropertyRecord): PropertyRecord {
  return { ...record, category: cloneCategory(record.category) };
}
