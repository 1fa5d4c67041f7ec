/**
 * Gateway command schemas
 * External payloads are validated and normalized here before reaching the engine.
 */

import { z } from "zod";
import {
  addressSchema,
  amountSchema,
  digestSchema,
  handleSchema,
  proposalIdSchema,
  proposalUrlSchema,
} from "@guildvault/shared";

export const sponsorMemberCommandSchema = z.object({
  type: z.literal("sponsorMember"),
  caller: addressSchema,
  member: addressSchema,
  handle: handleSchema,
});

export const vetoMemberCommandSchema = z.object({
  type: z.literal("vetoMember"),
  caller: addressSchema,
  member: addressSchema,
});

export const submitProposalCommandSchema = z.object({
  type: z.literal("submitProposal"),
  caller: addressSchema,
  url: proposalUrlSchema,
  digest: digestSchema,
  wallet: addressSchema,
  value: amountSchema,
});

export const vetoProposalCommandSchema = z.object({
  type: z.literal("vetoProposal"),
  caller: addressSchema,
  proposalId: proposalIdSchema,
});

export const claimProposalCommandSchema = z.object({
  type: z.literal("claimProposal"),
  caller: addressSchema,
  proposalId: proposalIdSchema,
});

export const donateCommandSchema = z.object({
  type: z.literal("donate"),
  caller: addressSchema,
  amount: amountSchema,
});

export const governanceCommandSchema = z.discriminatedUnion("type", [
  sponsorMemberCommandSchema,
  vetoMemberCommandSchema,
  submitProposalCommandSchema,
  vetoProposalCommandSchema,
  claimProposalCommandSchema,
  donateCommandSchema,
]);

export type GovernanceCommand = z.infer<typeof governanceCommandSchema>;
export type GovernanceCommandType = GovernanceCommand["type"];
