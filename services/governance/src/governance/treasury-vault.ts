/**
 * Treasury Vault
 *
 * Single pooled balance. Donations credit it; released proposal values
 * debit it and are credited to the payout wallet's running total.
 */

import { governanceLogger } from "@guildvault/shared";
import type { Address } from "viem";
import { InsufficientFundsError, InvalidInputError } from "./types.js";

const vaultLogger = governanceLogger.child({ component: "treasury-vault" });

export class TreasuryVault {
  private balance: bigint;
  private totalPaidOut = 0n;
  private readonly payouts: Map<Address, bigint> = new Map();

  constructor(openingBalance = 0n, payouts: Iterable<[Address, bigint]> = []) {
    if (openingBalance < 0n) {
      throw new InvalidInputError("Opening balance must not be negative");
    }
    this.balance = openingBalance;
    for (const [wallet, amount] of payouts) {
      this.payouts.set(wallet, amount);
      this.totalPaidOut += amount;
    }
  }

  deposit(amount: bigint): bigint {
    if (amount < 0n) {
      throw new InvalidInputError("Deposit must not be negative");
    }
    this.balance += amount;
    return this.balance;
  }

  /**
   * Debit the pool and credit the wallet. Throws before any change
   * when the pool cannot cover the amount.
   */
  release(wallet: Address, amount: bigint): void {
    if (amount > this.balance) {
      throw new InsufficientFundsError(amount, this.balance);
    }

    this.balance -= amount;
    this.totalPaidOut += amount;
    this.payouts.set(wallet, (this.payouts.get(wallet) ?? 0n) + amount);

    vaultLogger.info({
      wallet,
      amount: amount.toString(),
      balance: this.balance.toString(),
    }, "Funds released");
  }

  getBalance(): bigint {
    return this.balance;
  }

  getPayoutTotal(wallet: Address): bigint {
    return this.payouts.get(wallet) ?? 0n;
  }

  getTotalPaidOut(): bigint {
    return this.totalPaidOut;
  }

  listPayouts(): Array<[Address, bigint]> {
    return Array.from(this.payouts.entries());
  }
}
