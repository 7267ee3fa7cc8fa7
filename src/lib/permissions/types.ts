import type { PermissionLevel } from '../events/types';
import type { AllowLists } from '../config/schema';
import type { PermissionDeniedError } from './errors';

export type PermissionDenialReason = 'not_allow_listed' | 'level_too_low';

export interface PermissionRequest {
  operation: string;
  /** Defaults to `restricted`, leaving the decision to the allow-list */
  requiredLevel?: PermissionLevel;
  /** Who asked, for the audit log */
  requestedBy?: string;
  correlationId?: string;
}

export type PermissionDecision =
  | {
      allowed: true;
      operation: string;
      currentLevel: PermissionLevel;
      requiredLevel: PermissionLevel;
    }
  | {
      allowed: false;
      operation: string;
      currentLevel: PermissionLevel;
      requiredLevel: PermissionLevel;
      reason: PermissionDenialReason;
      error: PermissionDeniedError;
    };

export interface PermissionPolicyOptions {
  level: PermissionLevel;
  allowLists: AllowLists;
  allowListEnabled?: boolean;
  auditLogging?: boolean;
}

export interface PermissionDecisionEvent {
  decision: PermissionDecision;
  requestedBy?: string;
  correlationId?: string;
  timestamp: number;
}

export interface PermissionPolicyEventMap {
  'action:permission-decision': PermissionDecisionEvent;
}
