import fs from "fs-extra";
import crypto from "crypto";

export const IMAGE_DIGEST_ALGORITHM = "sha256";
export const IMAGE_DIGEST_LENGTH = 64;

const DIGEST_PATTERN = new RegExp(`^[0-9a-f]{${IMAGE_DIGEST_LENGTH}}$`);

/**
 * Calculate the SHA-256 digest of image bytes as lowercase hex
 */
export function hashImage(imageData: Uint8Array): string {
  const hashSum = crypto.createHash(IMAGE_DIGEST_ALGORITHM);
  hashSum.update(imageData);
  return hashSum.digest("hex");
}

/**
 * Calculate the digest of an image file on disk
 */
export async function hashImageFile(filePath: string): Promise<string> {
  const fileBuffer = await fs.readFile(filePath);
  return hashImage(fileBuffer);
}

export function isImageDigest(value: string): boolean {
  return DIGEST_PATTERN.test(value);
}
