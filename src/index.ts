// Export main PropertyRegistry class
export { PropertyRegistry, PropertyRegistryOptions } from "./PropertyRegistry";

// Export stores for custom implementations
export { PropertyStore } from "./storage/PropertyStore";
export { MemoryPropertyStore } from "./storage/MemoryPropertyStore";

export { ReadWriteLock, ReleaseFn, LockMode } from "./lock/ReadWriteLock";

export {
  hashImage,
  hashImageFile,
  isImageDigest,
  IMAGE_DIGEST_ALGORITHM,
  IMAGE_DIGEST_LENGTH,
} from "./hashing/ImageHasher";

export {
  PropertyCategory,
  PropertyCategoryKind,
  PropertyCategories,
  PROPERTY_CATEGORY_KINDS,
  formatCategory,
  categoriesEqual,
} from "./category";

export { PropertyRecord, PropertySummary } from "./types";

// Call boundary
export {
  PropertyRegistryApi,
  PropertyRegistryApiOptions,
  ApiMethod,
  ApiResults,
  ApiResponse,
  isApiMethod,
} from "./api/PropertyRegistryApi";
export { WirePropertyRecord, WirePropertySummary, WirePropertyType } from "./api/schemas";

export * from "./errors";
