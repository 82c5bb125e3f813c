import { z } from "zod";

export const DEFAULT_BASE_URL = "https://bootstrap.grid.tf";

export const NetworkSchema = z.enum(["mainnet", "devnet", "testnet", "qanet"]);
export type Network = z.infer<typeof NetworkSchema>;
export type NetworkCode = "prod" | "dev" | "test" | "qa";

export const NETWORKS = {
  mainnet: "prod",
  devnet: "dev",
  testnet: "test",
  qanet: "qa",
} as const satisfies Record<Network, NetworkCode>;

// Digits only, kept verbatim: "007" stays "007" in the URL
export const FarmIdSchema = z.string().regex(/^[0-9]+$/, "Farm ID must contain only decimal digits");

export function parseNetwork(input: string): { network: Network; code: NetworkCode } | undefined {
  const parsed = NetworkSchema.safeParse(input.trim().toLowerCase());
  if (!parsed.success) return undefined;
  return { network: parsed.data, code: NETWORKS[parsed.data] };
}

export function isFarmId(input: string): boolean {
  return FarmIdSchema.safeParse(input).success;
}

export function buildBootstrapUrl(code: NetworkCode, farmId: string, baseUrl: string = DEFAULT_BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, "")}/uefi/${code}/${farmId}`;
}
