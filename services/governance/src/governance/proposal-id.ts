/**
 * Proposal identifiers
 *
 * id = keccak256(abi.encode(sponsor, url, digest, wallet, value, timeSubmitted))
 * The submission second is part of the hash domain, so an identical payload
 * only collides with itself inside the same clock tick.
 */

import { encodeAbiParameters, getAddress, keccak256, type Hex } from "viem";
import { normalizeBytes32 } from "@guildvault/shared";
import type { ProposalFields } from "./types.js";

const PROPOSAL_ID_PARAMETERS = [
  { name: "sponsor", type: "address" },
  { name: "url", type: "bytes32[4]" },
  { name: "digest", type: "bytes32" },
  { name: "wallet", type: "address" },
  { name: "value", type: "uint256" },
  { name: "timeSubmitted", type: "uint256" },
] as const;

export function deriveProposalId(fields: ProposalFields): Hex {
  const encoded = encodeAbiParameters(PROPOSAL_ID_PARAMETERS, [
    getAddress(fields.sponsor),
    [
      normalizeBytes32(fields.url[0]),
      normalizeBytes32(fields.url[1]),
      normalizeBytes32(fields.url[2]),
      normalizeBytes32(fields.url[3]),
    ],
    normalizeBytes32(fields.digest),
    getAddress(fields.wallet),
    fields.value,
    BigInt(fields.timeSubmitted),
  ]);

  return keccak256(encoded);
}
