/**
 * Category Policy - role-set logic and an in-memory policy provider
 *
 * All role checks are pure functions over identifier sets; resolving which
 * roles a user or channel holds is the identity provider's concern.
 *
 * @module policy/category-policy
 */

import { InvariantViolation } from '../errors.js';
import type { CategoryPolicy, CategoryPolicyProvider, PingGroup } from '../types.js';

function intersects(granted: Iterable<string>, held: ReadonlySet<string>): boolean {
  for (const role of granted) {
    if (held.has(role)) return true;
  }
  return false;
}

/** Empty viewer set means the category is visible to everyone in its scope */
export function canView(policy: CategoryPolicy, roles: ReadonlySet<string>): boolean {
  return policy.viewerRoles.length === 0 || intersects(policy.viewerRoles, roles);
}

export function canCreate(policy: CategoryPolicy, roles: ReadonlySet<string>): boolean {
  return intersects(policy.creatorRoles, roles) || canManage(policy, roles);
}

export function canManage(policy: CategoryPolicy, roles: ReadonlySet<string>): boolean {
  return intersects(policy.managerRoles, roles);
}

/** Category ids in `policies` the holder of `roles` may view */
export function viewableCategoryIds(
  policies: CategoryPolicy[],
  roles: ReadonlySet<string>,
): string[] {
  return policies.filter((p) => canView(p, roles)).map((p) => p.id);
}

export function assertPolicyInvariants(policy: CategoryPolicy): void {
  if (policy.minSpacingMs < 0) {
    throw new InvariantViolation(`Category ${policy.id}: minSpacing must be >= 0`);
  }
  if (policy.maxAdvanceMs < 0) {
    throw new InvariantViolation(`Category ${policy.id}: maxAdvance must be >= 0`);
  }
  if (policy.reminderLeadMs !== undefined && policy.reminderLeadMs < 0) {
    throw new InvariantViolation(`Category ${policy.id}: reminderLead must be >= 0`);
  }
}

/**
 * Policy provider over a fixed set of categories (loaded from config).
 */
export class StaticPolicyProvider implements CategoryPolicyProvider {
  private readonly categories: Map<string, CategoryPolicy>;
  private readonly pingGroups: Map<string, PingGroup>;

  constructor(categories: CategoryPolicy[], pingGroups: PingGroup[] = []) {
    for (const policy of categories) {
      assertPolicyInvariants(policy);
    }
    this.categories = new Map(categories.map((c) => [c.id, c]));
    this.pingGroups = new Map(pingGroups.map((g) => [g.id, g]));
  }

  async getCategoryPolicy(categoryId: string): Promise<CategoryPolicy | null> {
    return this.categories.get(categoryId) ?? null;
  }

  async listCategoryPolicies(scopeId?: string): Promise<CategoryPolicy[]> {
    const all = Array.from(this.categories.values());
    return scopeId === undefined ? all : all.filter((c) => c.scopeId === scopeId);
  }

  async getPingGroup(pingGroupId: string): Promise<PingGroup | null> {
    return this.pingGroups.get(pingGroupId) ?? null;
  }
}
