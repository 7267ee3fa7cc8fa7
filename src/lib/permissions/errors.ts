import { PermissionDenied } from '../errors';
import type { PermissionLevel } from '../events/types';
import type { PermissionDenialReason } from './types';

export interface PermissionDeniedInfo {
  operation: string;
  reason: PermissionDenialReason;
  currentLevel: PermissionLevel;
  requiredLevel: PermissionLevel;
}

/**
 * Carried in `action-result` payloads and decisions; never thrown at the
 * publisher
 */
export class PermissionDeniedError extends PermissionDenied<PermissionDeniedInfo> {
  public readonly errPrefix = 'PermissionErr';
  public readonly errType = 'Action';
  public readonly errCode = 'Denied';

  constructor(additionalInfo: PermissionDeniedInfo) {
    super(
      additionalInfo.reason === 'level_too_low'
        ? `Operation "${additionalInfo.operation}" needs "${additionalInfo.requiredLevel}" but the current level is "${additionalInfo.currentLevel}"`
        : `Operation "${additionalInfo.operation}" is not allowed at level "${additionalInfo.currentLevel}"`,
      additionalInfo,
    );
  }
}
