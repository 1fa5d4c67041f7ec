/**
 * Shared test fixtures for governance tests
 */

import type { Address, Hex } from "viem";
import { ManualClock } from "../governance/clock.js";
import { createGovernanceEngine, type GovernanceEngine } from "../governance/governance-engine.js";
import type { GovernanceConfig, ProposalUrl } from "../governance/types.js";

/** Well past the first week, so genesis members are full members */
export const T0 = 1_700_000_000;

export const ALICE: Address = "0x1000000000000000000000000000000000000001";
export const BOB: Address = "0x2000000000000000000000000000000000000002";
export const CAROL: Address = "0x3000000000000000000000000000000000000003";
export const DAVE: Address = "0x4000000000000000000000000000000000000004";
export const WALLET: Address = "0x5000000000000000000000000000000000000005";

export function bytes32(n: number): Hex {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export const URL: ProposalUrl = [bytes32(0xa1), bytes32(0xa2), bytes32(0xa3), bytes32(0xa4)];
export const DIGEST = bytes32(0xd16e57);

export const ALICE_HANDLE = bytes32(1);
export const BOB_HANDLE = bytes32(2);

export function setupEngine(config?: Partial<GovernanceConfig>): {
  clock: ManualClock;
  engine: GovernanceEngine;
} {
  const clock = new ManualClock(T0);
  const engine = createGovernanceEngine({
    clock,
    config,
    genesisMembers: [
      { address: ALICE, handle: ALICE_HANDLE },
      { address: BOB, handle: BOB_HANDLE },
    ],
  });
  return { clock, engine };
}
