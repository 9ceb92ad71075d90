import { PropertyStore } from "./storage/PropertyStore";
import { MemoryPropertyStore } from "./storage/MemoryPropertyStore";
import { ReadWriteLock } from "./lock/ReadWriteLock";
import { hashImage } from "./hashing/ImageHasher";
import {
  PropertyCategory,
  cloneCategory,
  formatCategory,
} from "./category";
import { PropertyRecord, PropertySummary } from "./types";
import { ValidationError } from "./errors";
import fs from "fs-extra";

/**
 * Configuration options for PropertyRegistry
 */
export interface PropertyRegistryOptions {
  /**
   * Store holding the records (default: a new MemoryPropertyStore)
   */
  store?: PropertyStore;

  /**
   * Lock guarding the store (default: a new ReadWriteLock)
   */
  lock?: ReadWriteLock;

  /**
   * Suppress non-error log messages (default: false)
   */
  silent?: boolean;
}

/**
 * Registry associating property records with the digest of their image.
 *
 * Reads take shared access and run together; uploads and deletes take
 * exclusive access. Construct one instance per process and pass it to
 * every caller.
 */
export class PropertyRegistry {
  private readonly store: PropertyStore;
  private readonly lock: ReadWriteLock;
  private readonly silent: boolean;

  constructor(options: PropertyRegistryOptions = {}) {
    this.store = options.store || new MemoryPropertyStore();
    this.lock = options.lock || new ReadWriteLock();
    this.silent = options.silent || false;
  }

  /**
   * Hash an image and store a property record under the given id.
   * An existing record with the same id is replaced.
   *
   * @returns Promise resolving to the image digest
   * @throws ValidationError if the image data is empty
   */
  async uploadProperty(
    id: string,
    category: PropertyCategory,
    imageData: Uint8Array,
    description: string,
    owner: string,
  ): Promise<string> {
    if (imageData.length === 0) {
      console.error(`❌ Rejected upload for property ${id}: image data is empty`);
      throw new ValidationError("Image data is empty.");
    }

    const imageDigest = hashImage(imageData);
    const record: PropertyRecord = {
      id,
      category: cloneCategory(category),
      imageDigest,
      description,
      owner,
    };

    try {
      const replaced = await this.lock.withWrite(() => this.store.put(record));

      if (!this.silent) {
        console.log(
          replaced
            ? `♻️ Replaced property ${id} (${formatCategory(category)}) with image ${imageDigest}`
            : `✅ Stored property ${id} (${formatCategory(category)}) with image ${imageDigest}`,
        );
      }
      return imageDigest;
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to store property ${id}: ${errorMessage}`);
      throw error;
    }
  }

  /**
   * Read an image from disk and upload it as {@link uploadProperty} does
   */
  async uploadPropertyFromFile(
    id: string,
    category: PropertyCategory,
    imagePath: string,
    description: string,
    owner: string,
  ): Promise<string> {
    const imageData = await fs.readFile(imagePath);
    return this.uploadProperty(id, category, imageData, description, owner);
  }

  /**
   * Get a copy of the record stored under an id
   *
   * @returns Promise resolving to the record, or undefined if no record exists
   */
  async getPropertyById(id: string): Promise<PropertyRecord | undefined> {
    return this.lock.withRead(() => this.store.get(id));
  }

  /**
   * List every stored property as id, category display name and digest.
   * The returned array is a snapshot in the store's iteration order.
   */
  async getProperties(): Promise<PropertySummary[]> {
    const records = await this.lock.withRead(() => this.store.values());
    return records.map((record) => ({
      id: record.id,
      categoryName: formatCategory(record.category),
      imageDigest: record.imageDigest,
    }));
  }

  /**
   * Check if a property exists
   */
  async hasProperty(id: string): Promise<boolean> {
    return this.lock.withRead(() => this.store.has(id));
  }

  /**
   * Count stored properties
   */
  async size(): Promise<number> {
    return this.lock.withRead(() => this.store.size());
  }

  /**
   * Delete the record stored under an id
   *
   * @returns Promise resolving to true if a record was removed, false if none existed
   */
  async deleteProperty(id: string): Promise<boolean> {
    try {
      const removed = await this.lock.withWrite(() => this.store.delete(id));

      if (removed && !this.silent) {
        console.log(`🗑️ Deleted property ${id}`);
      }
      return removed;
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to delete property ${id}: ${errorMessage}`);
      throw error;
    }
  }
}
