export {
  PermissionPolicy,
  effectiveAllowList,
  permissionRank,
} from './permission-policy';
export * from './errors';
export * from './types';
