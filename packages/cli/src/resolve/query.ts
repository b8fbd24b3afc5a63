// resolve/query.ts — Build inventory queries from a classified lookup key

import type { InventoryQuery, QueryFilter } from "../inventory";
import type { KeyKind } from "./classify";

/** Only instances that can still be connected to. */
export const LIVE_STATE_FILTER: QueryFilter = {
  name: "instance-state-name",
  values: [
    "running",
    "pending",
  ],
};

export function buildQuery(raw: string, kind: KeyKind): InventoryQuery {
  switch (kind) {
    case "ip-address":
      return {
        filters: [
          {
            name: "private-ip-address",
            values: [
              raw,
            ],
          },
          LIVE_STATE_FILTER,
        ],
      };
    case "instance-id":
      return {
        instanceIds: [
          raw,
        ],
        filters: [
          LIVE_STATE_FILTER,
        ],
      };
    case "name":
      return {
        filters: [
          {
            name: "tag:Name",
            values: [
              raw,
            ],
          },
          LIVE_STATE_FILTER,
        ],
      };
  }
}

/** Query for `--list`: every running or pending instance. */
export function buildListQuery(): InventoryQuery {
  return {
    filters: [
      LIVE_STATE_FILTER,
    ],
  };
}
