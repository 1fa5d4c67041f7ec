/**
 * Command Gateway Tests
 *
 * - Payload validation and normalization
 * - Serialized execution in submission order
 * - Mapping of precondition failures to structured results
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { ONE_WEEK } from "@guildvault/shared";
import { CommandGateway, createCommandGateway } from "../gateway/command-gateway.js";
import type { GovernanceEngine, ManualClock } from "../governance/index.js";
import { ALICE, BOB, CAROL, DAVE, DIGEST, T0, URL, WALLET, bytes32, setupEngine } from "./fixtures.js";

describe("CommandGateway", () => {
  let clock: ManualClock;
  let engine: GovernanceEngine;
  let gateway: CommandGateway;

  beforeEach(() => {
    ({ clock, engine } = setupEngine());
    gateway = createCommandGateway(engine);
  });

  describe("validation", () => {
    it("should reject malformed addresses with the offending path", async () => {
      const result = await gateway.execute({ type: "donate", caller: "nope", amount: "5" });

      expect(result).toEqual({
        ok: false,
        error: { code: "InvalidInput", message: "caller: Invalid address" },
      });
      expect(gateway.processedCount).toBe(0);
    });

    it("should reject unknown command types", async () => {
      const result = await gateway.execute({ type: "mint", caller: ALICE });

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.code).toBe("InvalidInput");
    });

    it("should reject urls that do not have four blocks", async () => {
      const result = await gateway.execute({
        type: "submitProposal",
        caller: ALICE,
        url: [URL[0]],
        digest: DIGEST,
        wallet: WALLET,
        value: "1",
      });

      expect(!result.ok && result.error.code).toBe("InvalidInput");
    });

    it("should accept amounts as decimal strings", async () => {
      const result = await gateway.execute({ type: "donate", caller: DAVE, amount: "5000" });

      expect(result).toEqual({ ok: true, type: "donate", balance: 5000n });
      expect(engine.getTreasuryBalance()).toBe(5000n);
    });
  });

  describe("execution", () => {
    it("should run concurrent commands one at a time in submission order", async () => {
      const results = await Promise.all([
        gateway.execute({ type: "donate", caller: DAVE, amount: "1000" }),
        gateway.execute({ type: "submitProposal", caller: ALICE, url: URL, digest: DIGEST, wallet: WALLET, value: "100" }),
        gateway.execute({ type: "sponsorMember", caller: ALICE, member: CAROL, handle: bytes32(3) }),
        gateway.execute({ type: "sponsorMember", caller: BOB, member: CAROL, handle: bytes32(3) }),
      ]);

      expect(results[0]).toEqual({ ok: true, type: "donate", balance: 1000n });
      expect(results[1]?.ok).toBe(true);
      expect(results[2]).toEqual({
        ok: false,
        type: "sponsorMember",
        error: {
          code: "RateLimited",
          message: `Member ${ALICE} already acted this period; next action at ${T0 + ONE_WEEK}`,
          availableAt: T0 + ONE_WEEK,
        },
      });
      expect(results[3]).toEqual({ ok: true, type: "sponsorMember" });
      expect(engine.getMember(CAROL)?.sponsor).toBe(BOB);
      expect(gateway.processedCount).toBe(4);
    });

    it("should return the derived id and later pay the claim", async () => {
      await gateway.execute({ type: "donate", caller: DAVE, amount: "1000" });
      const submitted = await gateway.execute({
        type: "submitProposal",
        caller: ALICE,
        url: URL,
        digest: DIGEST,
        wallet: WALLET,
        value: "400",
      });
      if (!submitted.ok || submitted.type !== "submitProposal") {
        throw new Error("submission failed");
      }

      clock.advance(ONE_WEEK);
      const claimed = await gateway.execute({ type: "claimProposal", caller: DAVE, proposalId: submitted.proposalId });
      const again = await gateway.execute({ type: "claimProposal", caller: DAVE, proposalId: submitted.proposalId });

      expect(claimed).toEqual({ ok: true, type: "claimProposal", paid: 400n });
      expect(again).toEqual({ ok: true, type: "claimProposal", paid: 0n });
      expect(engine.getPayoutTotal(WALLET)).toBe(400n);
    });

    it("should report failures without availableAt when none applies", async () => {
      const result = await gateway.execute({ type: "vetoMember", caller: DAVE, member: ALICE });

      expect(result).toEqual({
        ok: false,
        type: "vetoMember",
        error: { code: "NotAMember", message: `Not a member: ${DAVE}` },
      });
    });

    it("should report success when an event listener throws after the commit", async () => {
      engine.on("member:new", () => {
        throw new Error("listener failed");
      });

      const result = await gateway.execute({ type: "sponsorMember", caller: ALICE, member: CAROL, handle: bytes32(3) });

      expect(result).toEqual({ ok: true, type: "sponsorMember" });
      expect(engine.isMember(CAROL)).toBe(true);
      expect(gateway.processedCount).toBe(1);
    });

    it("should propagate errors that are not governance failures", async () => {
      vi.spyOn(engine, "donate").mockImplementation(() => {
        throw new Error("ledger offline");
      });

      await expect(gateway.execute({ type: "donate", caller: DAVE, amount: "1" })).rejects.toThrow("ledger offline");
      await gateway.onIdle();
      expect(gateway.pending).toBe(0);
      expect(gateway.processedCount).toBe(0);
    });
  });
});
