/**
 * Governance Snapshots
 *
 * JSON-safe export of the full engine state, and validated restore.
 * Amounts travel as decimal strings; addresses and 32-byte values are
 * re-normalized on the way back in.
 */

import { z } from "zod";
import {
  addressSchema,
  amountSchema,
  bytes32Schema,
  governanceLogger,
  handleSchema,
  proposalUrlSchema,
  unixSecondsSchema,
} from "@guildvault/shared";
import { zeroAddress, type Address, type Hex } from "viem";
import type { Clock } from "../governance/clock.js";
import { GovernanceEngine } from "../governance/governance-engine.js";
import { deriveProposalId } from "../governance/proposal-id.js";
import type { GovernanceConfig } from "../governance/types.js";

const snapshotLogger = governanceLogger.child({ component: "snapshot" });

export const SNAPSHOT_VERSION = "1.0.0";

// ============================================
// SCHEMA
// ============================================

const memberSnapshotSchema = z.object({
  address: addressSchema,
  sponsor: addressSchema,
  handle: handleSchema,
  timeJoined: unixSecondsSchema,
  lastActionTime: unixSecondsSchema,
});

const proposalSnapshotSchema = z.object({
  id: bytes32Schema,
  sponsor: addressSchema,
  url: proposalUrlSchema,
  digest: bytes32Schema,
  wallet: addressSchema,
  value: amountSchema,
  timeSubmitted: unixSecondsSchema.min(1),
});

export const governanceSnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    takenAt: unixSecondsSchema,
    members: z.array(memberSnapshotSchema),
    takenHandles: z.array(handleSchema),
    proposals: z.array(proposalSnapshotSchema),
    treasuryBalance: amountSchema,
    payouts: z.array(z.tuple([addressSchema, amountSchema])),
  })
  .superRefine((snapshot, ctx) => {
    const addresses = new Set<Address>();
    const handles = new Set<Hex>();
    snapshot.members.forEach((member, i) => {
      if (member.address === zeroAddress || member.sponsor === zeroAddress) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["members", i],
          message: "Member address and sponsor must not be the zero address",
        });
      }
      if (addresses.has(member.address)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["members", i, "address"],
          message: `Duplicate member ${member.address}`,
        });
      }
      if (handles.has(member.handle)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["members", i, "handle"],
          message: `Handle ${member.handle} is held by more than one member`,
        });
      }
      addresses.add(member.address);
      handles.add(member.handle);
    });

    const ids = new Set<Hex>();
    snapshot.proposals.forEach((proposal, i) => {
      if (ids.has(proposal.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["proposals", i, "id"],
          message: `Duplicate proposal ${proposal.id}`,
        });
      }
      ids.add(proposal.id);

      // Neutralized proposals no longer carry the value their id was derived from
      if (proposal.value > 0n && deriveProposalId(proposal) !== proposal.id) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["proposals", i, "id"],
          message: `Proposal id ${proposal.id} does not match its fields`,
        });
      }
    });
  });

export type GovernanceSnapshot = z.input<typeof governanceSnapshotSchema>;

// ============================================
// EXPORT / RESTORE
// ============================================

export function exportSnapshot(engine: GovernanceEngine): GovernanceSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    takenAt: engine.getState().now,
    members: engine.listMembers(),
    takenHandles: engine.listTakenHandles(),
    proposals: engine.listProposals().map((p) => ({
      ...p,
      url: [...p.url],
      value: p.value.toString(),
    })),
    treasuryBalance: engine.getTreasuryBalance().toString(),
    payouts: engine.listPayouts().map(([wallet, amount]): [string, string] => [wallet, amount.toString()]),
  };
}

export function restoreEngine(
  snapshot: unknown,
  clock?: Clock,
  config?: Partial<GovernanceConfig>
): GovernanceEngine {
  const parsed = governanceSnapshotSchema.parse(snapshot);

  snapshotLogger.info({
    takenAt: parsed.takenAt,
    members: parsed.members.length,
    proposals: parsed.proposals.length,
  }, "Restoring governance state from snapshot");

  return new GovernanceEngine({
    clock,
    config,
    seed: {
      members: parsed.members,
      takenHandles: parsed.takenHandles,
      proposals: parsed.proposals,
      treasuryBalance: parsed.treasuryBalance,
      payouts: parsed.payouts,
    },
  });
}

export function serializeSnapshot(snapshot: GovernanceSnapshot): string {
  return JSON.stringify(
    snapshot,
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
    2
  );
}

export function parseSnapshot(json: string): GovernanceSnapshot {
  const raw: unknown = JSON.parse(json);
  const parsed = governanceSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid governance snapshot: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return exportParsed(parsed.data);
}

function exportParsed(data: z.output<typeof governanceSnapshotSchema>): GovernanceSnapshot {
  return {
    ...data,
    proposals: data.proposals.map((p) => ({ ...p, value: p.value.toString() })),
    treasuryBalance: data.treasuryBalance.toString(),
    payouts: data.payouts.map(([wallet, amount]): [string, string] => [wallet, amount.toString()]),
  };
}
