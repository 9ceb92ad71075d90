import { z } from "zod";
import { PropertyRegistry } from "../PropertyRegistry";
import {
  ErrorCode,
  ErrorCodes,
  PropertyRegistryError,
  UnknownMethodError,
  ValidationError,
} from "../errors";
import {
  WirePropertyRecord,
  WirePropertySummary,
  decodeImageData,
  decodePropertyType,
  encodePropertyRecord,
  noArgsSchema,
  propertyIdArgsSchema,
  uploadPropertyArgsSchema,
} from "./schemas";

/**
 * Result type of each externally callable method
 */
export interface ApiResults {
  upload_property: string;
  get_properties: WirePropertySummary[];
  get_property_by_id: WirePropertyRecord | null;
  delete_property: boolean;
}

export type ApiMethod = keyof ApiResults;

export type ApiResponse<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: { code: ErrorCode; message: string } };

/**
 * Options for the registry call boundary
 */
export interface PropertyRegistryApiOptions {
  /**
   * Registry the calls are dispatched to (default: a new PropertyRegistry)
   */
  registry?: PropertyRegistry;

  /**
   * Suppress non-error log messages of the default registry (default: false)
   */
  silent?: boolean;
}

type Handlers = { [M in ApiMethod]: (args: unknown) => Promise<ApiResults[M]> };

function parseArgs<T extends z.ZodTypeAny>(
  method: string,
  schema: T,
  args: unknown,
): z.output<T> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");
    throw new ValidationError(`Invalid arguments for ${method}: ${details}`);
  }
  return result.data;
}

/**
 * Structured call boundary for the registry.
 *
 * Decodes JSON payloads for the four external operations, runs them against
 * the registry and encodes the results as JSON values.
 */
export class PropertyRegistryApi {
  readonly registry: PropertyRegistry;
  private readonly handlers: Handlers;

  constructor(options: PropertyRegistryApiOptions = {}) {
    this.registry =
      options.registry || new PropertyRegistry({ silent: options.silent });

    this.handlers = {
      upload_property: async (args) => {
        const input = parseArgs("upload_property", uploadPropertyArgsSchema, args);
        return this.registry.uploadProperty(
          input.property_id,
          decodePropertyType(input.property_type),
          decodeImageData(input.image_data),
          input.description,
          input.owner,
        );
      },
      get_properties: async (args) => {
        parseArgs("get_properties", noArgsSchema, args);
        const summaries = await this.registry.getProperties();
        return summaries.map(
          (summary): WirePropertySummary => [
            summary.id,
            summary.categoryName,
            summary.imageDigest,
          ],
        );
      },
      get_property_by_id: async (args) => {
        const input = parseArgs("get_property_by_id", propertyIdArgsSchema, args);
        const record = await this.registry.getPropertyById(input.property_id);
        return record ? encodePropertyRecord(record) : null;
      },
      delete_property: async (args) => {
        const input = parseArgs("delete_property", propertyIdArgsSchema, args);
        return this.registry.deleteProperty(input.property_id);
      },
    };
  }

  get methods(): ApiMethod[] {
    return Object.keys(this.handlers).filter(isApiMethod);
  }

  /**
   * Invoke a method by name
   *
   * @throws UnknownMethodError for an unsupported method name
   * @throws ValidationError for a malformed payload or an empty image
   */
  call<M extends ApiMethod>(method: M, args?: unknown): Promise<ApiResults[M]>;
  call(method: string, args?: unknown): Promise<unknown>;
  async call(method: string, args?: unknown): Promise<unknown> {
    if (!isApiMethod(method)) {
      throw new UnknownMethodError(method);
    }
    const handler: (args: unknown) => Promise<unknown> = this.handlers[method];
    return handler(args);
  }

  /**
   * Invoke a method by name and report failures as a response value
   */
  async dispatch(method: string, args?: unknown): Promise<ApiResponse> {
    try {
      const value = await this.call(method, args);
      return { ok: true, value };
    } catch (error: unknown) {
      if (error instanceof PropertyRegistryError) {
        return { ok: false, error: { code: error.code, message: error.message } };
      }
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      console.error(`❌ Unexpected error in ${method}: ${errorMessage}`);
      return {
        ok: false,
        error: { code: ErrorCodes.UNKNOWN_ERROR, message: errorMessage },
      };
    }
  }
}

const API_METHODS: readonly string[] = [
  "upload_property",
  "get_properties",
  "get_property_by_id",
  "delete_property",
] satisfies ApiMethod[];

export function isApiMethod(method: string): method is ApiMethod {
  return API_METHODS.includes(method);
}
