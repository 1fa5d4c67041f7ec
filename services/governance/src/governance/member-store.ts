/**
 * Member Store
 *
 * Owns the member table and the taken-handle set. The registry mutates it,
 * the access guard reads it and stamps action times.
 */

import type { Address, Hex } from "viem";
import type { Member } from "./types.js";

export class MemberStore {
  private readonly members: Map<Address, Member> = new Map();
  private readonly takenHandles: Set<Hex> = new Set();

  get(address: Address): Member | undefined {
    const member = this.members.get(address);
    return member ? { ...member } : undefined;
  }

  has(address: Address): boolean {
    return this.members.has(address);
  }

  insert(member: Member): void {
    this.members.set(member.address, { ...member });
    this.takenHandles.add(member.handle);
  }

  /** Erases the record; the handle stays reserved unless released separately */
  erase(address: Address): Member | undefined {
    const member = this.members.get(address);
    this.members.delete(address);
    return member;
  }

  recordAction(address: Address, at: number): void {
    const member = this.members.get(address);
    if (member) {
      member.lastActionTime = at;
    }
  }

  isHandleTaken(handle: Hex): boolean {
    return this.takenHandles.has(handle);
  }

  reserveHandle(handle: Hex): void {
    this.takenHandles.add(handle);
  }

  releaseHandle(handle: Hex): void {
    this.takenHandles.delete(handle);
  }

  list(): Member[] {
    return Array.from(this.members.values(), (m) => ({ ...m }));
  }

  listTakenHandles(): Hex[] {
    return Array.from(this.takenHandles);
  }

  get size(): number {
    return this.members.size;
  }

  get takenHandleCount(): number {
    return this.takenHandles.size;
  }
}
