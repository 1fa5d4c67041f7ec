/**
 * Command Gateway
 *
 * Single serializing entry point for external callers. Commands are
 * validated with zod, then executed one at a time on a p-queue with
 * concurrency 1. Governance precondition failures come back as
 * structured results; anything else propagates.
 */

import PQueue from "p-queue";
import { gatewayLogger as logger, logError } from "@guildvault/shared";
import type { Hex } from "viem";
import type { GovernanceEngine } from "../governance/governance-engine.js";
import { isGovernanceError, type GovernanceErrorCode } from "../governance/types.js";
import { governanceCommandSchema, type GovernanceCommand, type GovernanceCommandType } from "./commands.js";

// ============================================
// TYPES
// ============================================

export interface GatewayFailure {
  ok: false;
  type?: GovernanceCommandType;
  error: {
    code: GovernanceErrorCode;
    message: string;
    availableAt?: number;
  };
}

export type GatewaySuccess =
  | { ok: true; type: "sponsorMember" | "vetoMember" | "vetoProposal" }
  | { ok: true; type: "submitProposal"; proposalId: Hex }
  | { ok: true; type: "claimProposal"; paid: bigint }
  | { ok: true; type: "donate"; balance: bigint };

export type GatewayResult = GatewaySuccess | GatewayFailure;

// ============================================
// COMMAND GATEWAY
// ============================================

export class CommandGateway {
  private readonly queue: PQueue;
  private processed = 0;

  constructor(private readonly engine: GovernanceEngine) {
    this.queue = new PQueue({ concurrency: 1 });
    logger.info("CommandGateway initialized");
  }

  /**
   * Validate and enqueue a command; resolves once it has run
   */
  async execute(payload: unknown): Promise<GatewayResult> {
    const parsed = governanceCommandSchema.safeParse(payload);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "command"}: ${issue.message}`)
        .join("; ");
      logger.warn({ issues: parsed.error.issues.length }, "Rejected malformed command");
      return { ok: false, error: { code: "InvalidInput", message } };
    }

    const command = parsed.data;
    return this.queue.add(() => this.run(command), { throwOnTimeout: true });
  }

  /**
   * Resolves when every queued command has finished
   */
  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  get processedCount(): number {
    return this.processed;
  }

  private async run(command: GovernanceCommand): Promise<GatewayResult> {
    try {
      const result = this.dispatch(command);
      this.processed++;
      return result;
    } catch (error) {
      if (!isGovernanceError(error)) {
        if (error instanceof Error) {
          logError(error, { command: command.type }, `Command ${command.type} failed`);
        }
        throw error;
      }

      this.processed++;
      return {
        ok: false,
        type: command.type,
        error: {
          code: error.code,
          message: error.message,
          ...("availableAt" in error && typeof error.availableAt === "number"
            ? { availableAt: error.availableAt }
            : {}),
        },
      };
    }
  }

  private dispatch(command: GovernanceCommand): GatewaySuccess {
    switch (command.type) {
      case "sponsorMember":
        this.engine.sponsorMember(command.caller, command.member, command.handle);
        return { ok: true, type: command.type };
      case "vetoMember":
        this.engine.vetoMember(command.caller, command.member);
        return { ok: true, type: command.type };
      case "submitProposal": {
        const proposal = this.engine.submitProposal(command.caller, {
          url: command.url,
          digest: command.digest,
          wallet: command.wallet,
          value: command.value,
        });
        return { ok: true, type: command.type, proposalId: proposal.id };
      }
      case "vetoProposal":
        this.engine.vetoProposal(command.caller, command.proposalId);
        return { ok: true, type: command.type };
      case "claimProposal":
        return { ok: true, type: command.type, paid: this.engine.claimProposal(command.caller, command.proposalId) };
      case "donate":
        return { ok: true, type: command.type, balance: this.engine.donate(command.caller, command.amount) };
    }
  }
}

export function createCommandGateway(engine: GovernanceEngine): CommandGateway {
  return new CommandGateway(engine);
}
