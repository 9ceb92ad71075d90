import { z } from "zod";
import { PropertyCategory } from "../category";
import { PropertyRecord } from "../types";

// Category travels as a single-key object naming the variant
export const propertyTypeSchema = z.union([
  z.object({ RealEstate: z.null() }).strict(),
  z.object({ Car: z.null() }).strict(),
  z.object({ Art: z.null() }).strict(),
  z.object({ Other: z.string() }).strict(),
]);

export type WirePropertyType = z.infer<typeof propertyTypeSchema>;

// Image bytes as an array of octets or a base64 string
export const imageDataSchema = z.union([
  z.array(z.number().int().min(0).max(255)),
  z.string().base64(),
]);

export const propertyIdArgsSchema = z
  .object({
    property_id: z.string(),
  })
  .strict();

export const uploadPropertyArgsSchema = z
  .object({
    property_id: z.string(),
    property_type: propertyTypeSchema,
    image_data: imageDataSchema,
    description: z.string(),
    owner: z.string(),
  })
  .strict();

export const noArgsSchema = z
  .union([z.null(), z.undefined(), z.object({}).strict()])
  .transform(() => undefined);

export type UploadPropertyArgs = z.infer<typeof uploadPropertyArgsSchema>;
export type PropertyIdArgs = z.infer<typeof propertyIdArgsSchema>;

export interface WirePropertyRecord {
  id: string;
  property_type: WirePropertyType;
  image_hash: string;
  description: string;
  owner: string;
}

/** One listing row: id, category display name, image digest */
export type WirePropertySummary = [string, string, string];

export function decodePropertyType(value: WirePropertyType): PropertyCategory {
  if ("Other" in value) return { kind: "Other", label: value.Other };
  if ("RealEstate" in value) return { kind: "RealEstate" };
  if ("Car" in value) return { kind: "Car" };
  return { kind: "Art" };
}

export function encodePropertyType(
  category: PropertyCategory,
): WirePropertyType {
  switch (category.kind) {
    case "RealEstate":
      return { RealEstate: null };
    case "Car":
      return { Car: null };
    case "Art":
      return { Art: null };
    case "Other":
      return { Other: category.label };
  }
}

export function decodeImageData(value: number[] | string): Uint8Array {
  if (typeof value === "string") {
    return new Uint8Array(Buffer.from(value, "base64"));
  }
  return Uint8Array.from(value);
}

export function encodePropertyRecord(
  record: PropertyRecord,
): WirePropertyRecord {
  return {
    id: record.id,
    property_type: encodePropertyType(record.category),
    image_hash: record.imageDigest,
    description: record.description,
    owner: record.owner,
  };
}
