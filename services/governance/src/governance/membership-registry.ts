/**
 * Membership Registry
 *
 * Admits members by sponsorship and removes provisional members by veto.
 * Member lifecycle: NonMember -> provisional (one week) -> full.
 * Only provisional members can be vetoed.
 */

import { governanceLogger, ONE_WEEK } from "@guildvault/shared";
import type { Address, Hex } from "viem";
import type { AccessGuard } from "./access-guard.js";
import type { MemberStore } from "./member-store.js";
import {
  AlreadyMemberError,
  HandleTakenError,
  NotAMemberError,
  VetoWindowClosedError,
  type GenesisMember,
  type GovernanceConfig,
  type GovernanceEventOf,
  type GovernanceEventSink,
  type Member,
} from "./types.js";

const registryLogger = governanceLogger.child({ component: "membership-registry" });

export class MembershipRegistry {
  constructor(
    private readonly store: MemberStore,
    private readonly guard: AccessGuard,
    private readonly config: Pick<GovernanceConfig, "releaseHandleOnVeto">,
    private readonly emit: GovernanceEventSink
  ) {}

  /**
   * Admit founding members. They sponsor themselves and join at time 0,
   * so they become full members once the clock reaches ONE_WEEK and can
   * never be vetoed. On a clock that starts below ONE_WEEK they stay
   * provisional until then.
   */
  admitGenesis(members: GenesisMember[]): void {
    for (const { address, handle } of members) {
      if (this.store.has(address)) {
        throw new AlreadyMemberError(address);
      }
      if (this.store.isHandleTaken(handle)) {
        throw new HandleTakenError(handle);
      }

      this.store.insert({
        address,
        sponsor: address,
        handle,
        timeJoined: 0,
        lastActionTime: 0,
      });
    }

    registryLogger.info({ count: members.length }, "Genesis members admitted");
  }

  sponsorMember(caller: Address, newMember: Address, handle: Hex, now: number): Member {
    const admitted = this.guard.rateLimited(caller, now, () => {
      if (this.store.has(newMember)) {
        throw new AlreadyMemberError(newMember);
      }
      if (this.store.isHandleTaken(handle)) {
        throw new HandleTakenError(handle);
      }

      const member: Member = {
        address: newMember,
        sponsor: caller,
        handle,
        timeJoined: now,
        lastActionTime: 0,
      };
      this.store.insert(member);
      return member;
    });

    registryLogger.info({ sponsor: caller, member: newMember, handle, at: now }, "Member sponsored");

    const event: GovernanceEventOf<"NewMember"> = {
      type: "NewMember",
      sponsor: caller,
      member: newMember,
      at: now,
    };
    this.emit(event);

    return admitted;
  }

  vetoMember(caller: Address, target: Address, now: number): Member {
    this.guard.requireFullMember(caller, now);

    const member = this.store.get(target);
    if (!member) {
      throw new NotAMemberError(target);
    }

    const closesAt = member.timeJoined + ONE_WEEK;
    if (now >= closesAt) {
      throw new VetoWindowClosedError(`member ${target}`, closesAt);
    }

    this.store.erase(target);
    if (this.config.releaseHandleOnVeto) {
      this.store.releaseHandle(member.handle);
    }

    registryLogger.info({
      vetoer: caller,
      member: target,
      handleReleased: this.config.releaseHandleOnVeto,
      at: now,
    }, "Member vetoed");

    this.emit({ type: "MemberVetoed", vetoer: caller, member: target, at: now });

    return member;
  }

  getMember(address: Address): Member | undefined {
    return this.store.get(address);
  }

  isMember(address: Address): boolean {
    return this.store.has(address);
  }

  isFullMember(address: Address, now: number): boolean {
    const member = this.store.get(address);
    return member !== undefined && now - member.timeJoined >= ONE_WEEK;
  }

  isHandleTaken(handle: Hex): boolean {
    return this.store.isHandleTaken(handle);
  }

  listMembers(): Member[] {
    return this.store.list();
  }
}
