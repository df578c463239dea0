export const RG_ID = "/subscriptions/sub-123/resourceGroups/test-rg/providers";

/**
 * Paged iterator as returned by SDK list operations.
 */
export async function* pages<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

export function createMockNetworkClient() {
  return {
    networkInterfaces: {
      get: jest.fn(),
      beginCreateOrUpdateAndWait: jest.fn(),
    },
    subnets: {
      get: jest.fn(),
      beginCreateOrUpdateAndWait: jest.fn(),
    },
    networkSecurityGroups: {
      get: jest.fn(),
      beginCreateOrUpdateAndWait: jest.fn(),
    },
    securityRules: {
      list: jest.fn(),
      beginCreateOrUpdateAndWait: jest.fn(),
      beginDeleteAndWait: jest.fn(),
    },
    publicIPAddresses: {
      get: jest.fn(),
      listAll: jest.fn(),
    },
  };
}

export function createMockComputeClient() {
  return {
    virtualMachines: {
      get: jest.fn(),
      listAll: jest.fn(),
      instanceView: jest.fn(),
      beginStartAndWait: jest.fn(),
    },
  };
}
