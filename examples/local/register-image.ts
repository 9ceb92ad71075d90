import { PropertyRegistry, PropertyCategories } from "../../src";
import { config } from "./config";

/**
 * Example registering a property from an image file on disk
 *
 * Pass the image path as the first argument, e.g. ./photos/lake-house.jpg
 */
async function main() {
  const imagePath = process.argv[2];
  if (!imagePath) {
    console.error("Usage: register-image <image-path>");
    process.exitCode = 1;
    return;
  }

  const registry = new PropertyRegistry();

  const digest = await registry.uploadPropertyFromFile(
    config.propertyId,
    PropertyCategories.realEstate(),
    imagePath,
    config.description,
    config.owner,
  );
  console.log(`🔑 Image digest: ${digest}`);

  const record = await registry.getPropertyById(config.propertyId);
  console.log("📄 Stored record:", record);

  for (const property of await registry.getProperties()) {
    console.log(`  ${property.id}  ${property.categoryName}  ${property.imageDigest}`);
  }
}

main().catch(console.error);
