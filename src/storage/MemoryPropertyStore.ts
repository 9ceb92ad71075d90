import { PropertyStore } from "./PropertyStore";
import { PropertyRecord, cloneRecord } from "../types";

/**
 * In-memory property store backed by a Map.
 *
 * Lifetime equals the instance's lifetime; nothing is persisted.
 * Iteration order is insertion order, and overwriting a key keeps its
 * original position.
 */
export class MemoryPropertyStore implements PropertyStore {
  private records: Map<string, PropertyRecord> = new Map();

  constructor(initial: PropertyRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.id, cloneRecord(record));
    }
  }

  async get(id: string): Promise<PropertyRecord | undefined> {
    const record = this.records.get(id);
    return record ? cloneRecord(record) : undefined;
  }

  async put(record: PropertyRecord): Promise<boolean> {
    const replaced = this.records.has(record.id);
    this.records.set(record.id, cloneRecord(record));
    return replaced;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async has(id: string): Promise<boolean> {
    return this.records.has(id);
  }

  async values(): Promise<PropertyRecord[]> {
    return Array.from(this.records.values(), cloneRecord);
  }

  async size(): Promise<number> {
    return this.records.size;
  }
}
