/**
 * Role Registry — owner, manager and treasury identities.
 *
 * Capability checks take the caller's identity explicitly; nothing is
 * inferred from ambient state. No role can ever be unset.
 *
 * - owner: setManager, transferOwnership, emergencyWithdraw
 * - manager: rebalance
 * - treasury: receives performance fees (no capabilities)
 */

import type { Role, RoleAssignments } from "./types.js";
import { VaultError } from "./types.js";

export interface RoleChange {
  readonly role: Role;
  readonly previous: string;
  readonly next: string;
}

export class RoleRegistry {
  private assignments: RoleAssignments;

  constructor(assignments: RoleAssignments) {
    assertIdentity("owner", assignments.owner);
    assertIdentity("manager", assignments.manager);
    assertIdentity("treasury", assignments.treasury);
    this.assignments = { ...assignments };
  }

  get owner(): string {
    return this.assignments.owner;
  }

  get manager(): string {
    return this.assignments.manager;
  }

  get treasury(): string {
    return this.assignments.treasury;
  }

  has(role: Role, caller: string): boolean {
    return this.assignments[role] === caller;
  }

  /**
   * Throw UNAUTHORIZED unless `caller` holds one of `roles`.
   */
  require(caller: string, ...roles: readonly Role[]): void {
    if (roles.some((role) => this.has(role, caller))) {
      return;
    }
    throw new VaultError(
      "UNAUTHORIZED",
      `"${caller}" is not ${roles.join(" or ")}`,
      { details: { caller, required: roles } },
    );
  }

  setManager(caller: string, next: string): RoleChange {
    return this.reassign(caller, "manager", next);
  }

  transferOwnership(caller: string, next: string): RoleChange {
    return this.reassign(caller, "owner", next);
  }

  snapshot(): RoleAssignments {
    return { ...this.assignments };
  }

  private reassign(caller: string, role: "owner" | "manager", next: string): RoleChange {
    this.require(caller, "owner");
    assertIdentity(role, next);

    const previous = this.assignments[role];
    this.assignments = { ...this.assignments, [role]: next };
    return { role, previous, next };
  }
}

function assertIdentity(role: Role, identity: string): void {
  if (typeof identity !== "string" || identity.trim() === "") {
    throw new VaultError("INVALID_IDENTITY", `The ${role} identity must be a non-empty string`);
  }
}
