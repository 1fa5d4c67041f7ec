/**
 * Access Guard
 *
 * Gates mutating actions behind two checks:
 * - caller is a full member (admitted at least one week ago)
 * - caller has not sponsored or proposed within the last week
 *
 * Sponsoring and proposing share one weekly budget. The action time is
 * stamped only after the wrapped action returns without throwing.
 */

import { governanceLogger, ONE_WEEK } from "@guildvault/shared";
import type { Address } from "viem";
import type { MemberStore } from "./member-store.js";
import {
  NotAMemberError,
  NotYetFullError,
  RateLimitedError,
  type Member,
} from "./types.js";

const guardLogger = governanceLogger.child({ component: "access-guard" });

export class AccessGuard {
  constructor(
    private readonly store: MemberStore,
    private readonly cooldownSeconds: number = ONE_WEEK,
    private readonly provisionalSeconds: number = ONE_WEEK
  ) {}

  /**
   * Fails with NotAMember or NotYetFull; returns the caller's record
   */
  requireFullMember(caller: Address, now: number): Member {
    const member = this.store.get(caller);
    if (!member) {
      throw new NotAMemberError(caller);
    }

    if (now - member.timeJoined < this.provisionalSeconds) {
      throw new NotYetFullError(caller, member.timeJoined + this.provisionalSeconds);
    }

    return member;
  }

  requireCooldownElapsed(member: Member, now: number): void {
    if (now - member.lastActionTime < this.cooldownSeconds) {
      throw new RateLimitedError(member.address, member.lastActionTime + this.cooldownSeconds);
    }
  }

  /**
   * Full-member and cooldown checks around an action.
   * A thrown action leaves the caller's budget untouched.
   */
  rateLimited<T>(caller: Address, now: number, action: (member: Member) => T): T {
    const member = this.requireFullMember(caller, now);
    this.requireCooldownElapsed(member, now);

    const result = action(member);

    this.store.recordAction(caller, now);
    guardLogger.debug({ caller, at: now }, "Action budget consumed");

    return result;
  }

  /**
   * Earliest second at which the member may sponsor or propose again
   */
  nextActionAt(member: Member): number {
    return Math.max(
      member.timeJoined + this.provisionalSeconds,
      member.lastActionTime + this.cooldownSeconds
    );
  }
}
