import { describe, it, expect } from "vitest";
import { zeroAddress } from "viem";
import { ZodError } from "zod";
import { ONE_DAY, ONE_WEEK } from "@guildvault/shared";
import {
  GovernanceEngine,
  HandleTakenError,
  InvalidInputError,
  ManualClock,
  RateLimitedError,
} from "../governance/index.js";
import {
  SNAPSHOT_VERSION,
  exportSnapshot,
  parseSnapshot,
  restoreEngine,
  serializeSnapshot,
} from "../storage/snapshot.js";
import { ALICE, ALICE_HANDLE, BOB, BOB_HANDLE, CAROL, DAVE, DIGEST, T0, URL, WALLET, bytes32, setupEngine } from "./fixtures.js";

function buildHistory() {
  const { clock, engine } = setupEngine();
  engine.donate(DAVE, 1_000n);
  engine.sponsorMember(ALICE, CAROL, bytes32(3));
  const proposal = engine.submitProposal(BOB, { url: URL, digest: DIGEST, wallet: WALLET, value: 600n });
  clock.advance(ONE_DAY);
  return { clock, engine, proposal };
}

describe("Governance snapshots", () => {
  it("should export amounts as decimal strings", () => {
    const { engine, proposal } = buildHistory();

    const snapshot = exportSnapshot(engine);

    expect(snapshot.version).toBe(SNAPSHOT_VERSION);
    expect(snapshot.takenAt).toBe(T0 + ONE_DAY);
    expect(snapshot.treasuryBalance).toBe("1000");
    expect(snapshot.takenHandles).toEqual([ALICE_HANDLE, BOB_HANDLE, bytes32(3)]);
    expect(snapshot.proposals).toEqual([
      {
        id: proposal.id,
        sponsor: BOB,
        url: [...URL],
        digest: DIGEST,
        wallet: WALLET,
        value: "600",
        timeSubmitted: T0,
      },
    ]);
  });

  it("should restore an engine that behaves like the original", () => {
    const { engine, proposal } = buildHistory();
    const json = serializeSnapshot(exportSnapshot(engine));

    const clock = new ManualClock(T0 + ONE_DAY);
    const restored = restoreEngine(parseSnapshot(json), clock);

    expect(restored.listMembers()).toEqual(engine.listMembers());
    expect(restored.getProposal(proposal.id)).toEqual(engine.getProposal(proposal.id));
    expect(restored.getTreasuryBalance()).toBe(1_000n);
    expect(restored.isHandleTaken(bytes32(3))).toBe(true);
    expect(() => restored.sponsorMember(ALICE, DAVE, bytes32(4))).toThrow(RateLimitedError);

    clock.set(T0 + ONE_WEEK);
    expect(restored.claimProposal(DAVE, proposal.id)).toBe(600n);
    expect(restored.getPayoutTotal(WALLET)).toBe(600n);

    const after = exportSnapshot(restored);
    expect(after.payouts).toEqual([[WALLET, "600"]]);
    expect(after.treasuryBalance).toBe("400");
  });

  it("should reject snapshots that fail validation", () => {
    const { engine } = buildHistory();
    const broken = { ...exportSnapshot(engine), treasuryBalance: "-5" };

    expect(() => parseSnapshot(JSON.stringify(broken))).toThrow(/^Invalid governance snapshot/);
  });

  describe("membership and proposal invariants", () => {
    const extraMember = (sponsor: string, handle: string) => ({
      address: DAVE,
      sponsor,
      handle,
      timeJoined: T0,
      lastActionTime: 0,
    });

    it("should reject a member sponsored by the zero address", () => {
      const base = exportSnapshot(buildHistory().engine);
      const bad = { ...base, members: [...base.members, extraMember(zeroAddress, bytes32(9))] };

      expect(() => parseSnapshot(JSON.stringify(bad))).toThrow(
        "Invalid governance snapshot: Member address and sponsor must not be the zero address"
      );
      expect(() => restoreEngine(bad, new ManualClock(T0))).toThrow(ZodError);
    });

    it("should reject two members holding the same handle", () => {
      const base = exportSnapshot(buildHistory().engine);
      const bad = { ...base, members: [...base.members, extraMember(ALICE, ALICE_HANDLE)] };

      expect(() => parseSnapshot(JSON.stringify(bad))).toThrow(
        `Invalid governance snapshot: Handle ${ALICE_HANDLE} is held by more than one member`
      );
    });

    it("should reject a member listed twice", () => {
      const base = exportSnapshot(buildHistory().engine);
      const twice = { address: ALICE, sponsor: ALICE, handle: bytes32(9), timeJoined: 0, lastActionTime: 0 };
      const bad = { ...base, members: [...base.members, twice] };

      expect(() => parseSnapshot(JSON.stringify(bad))).toThrow(
        `Invalid governance snapshot: Duplicate member ${ALICE}`
      );
    });

    it("should reject a proposal listed twice", () => {
      const { engine, proposal } = buildHistory();
      const base = exportSnapshot(engine);
      const bad = { ...base, proposals: [...base.proposals, ...base.proposals] };

      expect(() => parseSnapshot(JSON.stringify(bad))).toThrow(
        `Invalid governance snapshot: Duplicate proposal ${proposal.id}`
      );
    });

    it("should reject a live proposal whose value no longer matches its id", () => {
      const { engine, proposal } = buildHistory();
      const base = exportSnapshot(engine);
      const bad = { ...base, proposals: base.proposals.map((p) => ({ ...p, value: "500" })) };

      expect(() => parseSnapshot(JSON.stringify(bad))).toThrow(
        `Invalid governance snapshot: Proposal id ${proposal.id} does not match its fields`
      );
    });

    it("should accept neutralized proposals whose value was zeroed", () => {
      const { clock, engine, proposal } = buildHistory();
      engine.vetoProposal(ALICE, proposal.id);
      clock.advance(1);

      const restored = restoreEngine(parseSnapshot(serializeSnapshot(exportSnapshot(engine))), clock);

      expect(restored.getProposal(proposal.id)?.value).toBe(0n);
    });

    it("should guard seeds passed straight to the engine", () => {
      const member = { address: BOB, sponsor: ALICE, handle: ALICE_HANDLE, timeJoined: 0, lastActionTime: 0 };

      expect(
        () =>
          new GovernanceEngine({
            clock: new ManualClock(T0),
            seed: {
              members: [{ ...member, address: ALICE }, member],
              takenHandles: [],
              proposals: [],
              treasuryBalance: 0n,
              payouts: [],
            },
          })
      ).toThrow(HandleTakenError);
    });
  });

  it("should refuse to restore an empty membership", () => {
    const { engine } = buildHistory();
    const empty = { ...exportSnapshot(engine), members: [] };

    expect(() => restoreEngine(empty, new ManualClock(T0))).toThrow(InvalidInputError);
  });
});
