import { PropertyRegistryApi } from "../../src";

/**
 * Example driving the registry through its JSON call boundary
 */
async function main() {
  const api = new PropertyRegistryApi();

  const calls: Array<[string, unknown]> = [
    [
      "upload_property",
      {
        property_id: "car-7",
        property_type: { Car: null },
        image_data: "iVBORw0KGgo=",
        description: "Vintage roadster",
        owner: "demo_owner",
      },
    ],
    [
      "upload_property",
      {
        property_id: "boat-2",
        property_type: { Other: "boat" },
        image_data: [0x01, 0x02, 0x03],
        description: "Sailboat",
        owner: "demo_owner",
      },
    ],
    // Rejected: empty image
    [
      "upload_property",
      {
        property_id: "art-1",
        property_type: { Art: null },
        image_data: [],
        description: "Sketch",
        owner: "demo_owner",
      },
    ],
    ["get_properties", null],
    ["get_property_by_id", { property_id: "car-7" }],
    ["delete_property", { property_id: "boat-2" }],
    ["delete_property", { property_id: "boat-2" }],
  ];

  for (const [method, args] of calls) {
    const response = await api.dispatch(method, args);
    console.log(`${method} ->`, JSON.stringify(response));
  }
}

main().catch(console.error);
