// inventory.ts — The inventory seam between the resolver and a cloud provider

import type { Instance } from "@aws-sdk/client-ec2";

/** Provider-native instance record. The resolver reads InstanceId, PrivateIpAddress, KeyName and Tags. */
export type InstanceRecord = Instance;

/** A named filter; a record matches when its field equals any of `values`. */
export interface QueryFilter {
  name: string;
  values: string[];
}

/** Filters are ANDed together, and with `instanceIds` when present. */
export interface InventoryQuery {
  instanceIds?: string[];
  filters: QueryFilter[];
}

export interface InventoryClient {
  /** One round-trip; reservations are flattened away. Rejects with ProviderError. */
  describe(query: InventoryQuery): Promise<InstanceRecord[]>;
}
