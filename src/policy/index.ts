export {
  StaticPolicyProvider,
  assertPolicyInvariants,
  canCreate,
  canManage,
  canView,
  viewableCategoryIds,
} from './category-policy.js';
