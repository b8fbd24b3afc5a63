// aws/aws.ts — EC2 inventory: DescribeInstances behind the InventoryClient seam

import {
  EC2Client,
  DescribeInstancesCommand,
  type DescribeInstancesCommandInput,
  type DescribeInstancesCommandOutput,
} from "@aws-sdk/client-ec2";
import { hasMessage, hasStringField } from "@ec2hop/shared";
import type { InstanceRecord, InventoryClient, InventoryQuery } from "../inventory";
import { ProviderError } from "../shared/errors";
import type { DebugLog } from "../shared/ui";

export type DescribeInstances = (input: DescribeInstancesCommandInput) => Promise<DescribeInstancesCommandOutput>;

export interface Ec2ClientOptions {
  /** Falls back to the SDK chain (AWS_REGION, shared config profile) when unset. */
  region?: string;
}

/** Real DescribeInstances over the SDK. One attempt per call; failures are not retried. */
export function createDescribeInstances(opts: Ec2ClientOptions = {}): DescribeInstances {
  const client = new EC2Client({
    maxAttempts: 1,
    ...(opts.region
      ? {
          region: opts.region,
        }
      : {}),
  });
  return (input) => client.send(new DescribeInstancesCommand(input));
}

/**
 * Error code of an SDK exception. Service exceptions carry it as `name`
 * (e.g. "UnauthorizedOperation"); older shapes use `Code`.
 */
export function getAwsErrorCode(err: unknown): string | undefined {
  if (hasStringField(err, "Code")) {
    return err.Code;
  }
  if (hasStringField(err, "name") && err.name !== "Error") {
    return err.name;
  }
  return undefined;
}

export function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) {
    return err;
  }
  const message = hasMessage(err) ? err.message : String(err);
  return new ProviderError(message, {
    code: getAwsErrorCode(err),
    cause: err,
  });
}

export function toDescribeInput(query: InventoryQuery): DescribeInstancesCommandInput {
  return {
    ...(query.instanceIds
      ? {
          InstanceIds: query.instanceIds,
        }
      : {}),
    Filters: query.filters.map((f) => ({
      Name: f.name,
      Values: f.values,
    })),
  };
}

export class Ec2Inventory implements InventoryClient {
  private describeInstances: DescribeInstances;
  private debug: DebugLog;

  constructor(describeInstances: DescribeInstances, debug: DebugLog = () => {}) {
    this.describeInstances = describeInstances;
    this.debug = debug;
  }

  async describe(query: InventoryQuery): Promise<InstanceRecord[]> {
    this.debug("aws api: describing instances");
    let output: DescribeInstancesCommandOutput;
    try {
      output = await this.describeInstances(toDescribeInput(query));
    } catch (err) {
      throw toProviderError(err);
    }
    const reservations = output.Reservations ?? [];
    this.debug(`aws api: got ${reservations.length} reservation(s)`);
    return reservations.flatMap((r) => r.Instances ?? []);
  }
}
