interface LocalConfig {
  propertyId: string;
  owner: string;
  description: string;
}

// Sample values for the local example
export const config: LocalConfig = {
  propertyId: 'lake-house-01',
  owner: 'demo_owner',
  description: 'Lake house with a boat dock',
};
