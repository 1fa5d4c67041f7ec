/**
 * Input normalization for the typed engine API.
 * Addresses are keyed in checksummed form, 32-byte values in lowercase.
 */

import { getAddress, isAddress, zeroAddress, type Address, type Hex } from "viem";
import { URL_BLOCK_COUNT, isBytes32, normalizeBytes32 } from "@guildvault/shared";
import { InvalidInputError, type ProposalUrl } from "./types.js";

export function toPrincipal(value: string, label: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new InvalidInputError(`${label} is not a valid address: ${value}`);
  }
  return getAddress(value);
}

/** Like toPrincipal, but also refuses the zero sentinel */
export function toNonZeroPrincipal(value: string, label: string): Address {
  const address = toPrincipal(value, label);
  if (address === zeroAddress) {
    throw new InvalidInputError(`${label} must not be the zero address`);
  }
  return address;
}

export function toBytes32(value: string, label: string): Hex {
  if (!isBytes32(value)) {
    throw new InvalidInputError(`${label} must be a 0x-prefixed 32-byte hex value`);
  }
  return normalizeBytes32(value);
}

export function toProposalUrl(url: readonly string[]): ProposalUrl {
  if (url.length !== URL_BLOCK_COUNT) {
    throw new InvalidInputError(`url must have exactly ${URL_BLOCK_COUNT} blocks, got ${url.length}`);
  }
  return [
    toBytes32(url[0] ?? "", "url[0]"),
    toBytes32(url[1] ?? "", "url[1]"),
    toBytes32(url[2] ?? "", "url[2]"),
    toBytes32(url[3] ?? "", "url[3]"),
  ];
}

export function toAmount(value: bigint, label: string): bigint {
  if (value < 0n) {
    throw new InvalidInputError(`${label} must not be negative`);
  }
  return value;
}
