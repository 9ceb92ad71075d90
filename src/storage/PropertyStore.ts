import { PropertyRecord } from "../types";

/**
 * Interface for property record stores.
 *
 * Implementations own their records: values passed in are copied on write
 * and values handed out are copies, so callers can never mutate stored state.
 * Stores do no locking of their own; {@link PropertyRegistry} serializes
 * access through its lock.
 */
export interface PropertyStore {
  /**
   * Gets the record stored under an id
   *
   * @param id - Property identifier
   * @returns Promise resolving to a copy of the record, or undefined if absent
   */
  get(id: string): Promise<PropertyRecord | undefined>;

  /**
   * Stores a record under its own id, replacing any existing record
   *
   * @param record - Record to store
   * @returns Promise resolving to true if an existing record was replaced
   */
  put(record: PropertyRecord): Promise<boolean>;

  /**
   * Removes the record stored under an id
   *
   * @param id - Property identifier
   * @returns Promise resolving to true if a record was removed
   */
  delete(id: string): Promise<boolean>;

  /**
   * Checks whether a record is stored under an id
   */
  has(id: string): Promise<boolean>;

  /**
   * Lists copies of all stored records in the store's iteration order
   */
  values(): Promise<PropertyRecord[]>;

  /**
   * Counts stored records
   */
  size(): Promise<number>;
}
