import { EventEmitterProtected } from '../event-emitter';
import type { Logger, LoggerService } from '../logger';
import { PERMISSION_LEVELS, type PermissionLevel } from '../events/types';
import type { AllowLists } from '../config/schema';
import { PermissionDeniedError } from './errors';
import type {
  PermissionDecision,
  PermissionPolicyEventMap,
  PermissionPolicyOptions,
  PermissionRequest,
} from './types';

export function permissionRank(level: PermissionLevel): number {
  return PERMISSION_LEVELS.indexOf(level);
}

/**
 * Operations allowed at `level`.
 *
 * `restricted` stands alone. Every other level allows its own list plus the
 * lists of the levels below it, `restricted` excluded.
 */
export function effectiveAllowList(
  allowLists: AllowLists,
  level: PermissionLevel,
): Set<string> {
  if (level === 'restricted') {
    return new Set(allowLists.restricted);
  }

  const allowed = new Set<string>();

  for (const candidate of PERMISSION_LEVELS) {
    if (candidate === 'restricted') {
      continue;
    }

    if (permissionRank(candidate) > permissionRank(level)) {
      break;
    }

    for (const operation of allowLists[candidate]) {
      allowed.add(operation);
    }
  }

  return allowed;
}

/**
 * Gatekeeper for action components. Every decision is logged and emitted
 * as `action:permission-decision`.
 */
export class PermissionPolicy extends EventEmitterProtected<PermissionPolicyEventMap> {
  private readonly logger: LoggerService;
  private readonly level: PermissionLevel;
  private readonly allowListEnabled: boolean;
  private readonly auditLogging: boolean;
  private readonly allowed: ReadonlySet<string>;

  constructor(logger: Logger, options: PermissionPolicyOptions) {
    super();

    this.logger = logger.service('permission-policy');
    this.level = options.level;
    this.allowListEnabled = options.allowListEnabled ?? true;
    this.auditLogging = options.auditLogging ?? true;
    this.allowed = effectiveAllowList(options.allowLists, options.level);
  }

  public getLevel(): PermissionLevel {
    return this.level;
  }

  public isAllowListEnabled(): boolean {
    return this.allowListEnabled;
  }

  public getAllowedOperations(): string[] {
    return [...this.allowed].sort();
  }

  public check(request: PermissionRequest): PermissionDecision {
    const requiredLevel = request.requiredLevel ?? 'restricted';
    const base = {
      operation: request.operation,
      currentLevel: this.level,
      requiredLevel,
    };

    let decision: PermissionDecision;

    if (permissionRank(requiredLevel) > permissionRank(this.level)) {
      decision = {
        ...base,
        allowed: false,
        reason: 'level_too_low',
        error: new PermissionDeniedError({ ...base, reason: 'level_too_low' }),
      };
    } else if (this.allowListEnabled && !this.allowed.has(request.operation)) {
      decision = {
        ...base,
        allowed: false,
        reason: 'not_allow_listed',
        error: new PermissionDeniedError({ ...base, reason: 'not_allow_listed' }),
      };
    } else {
      decision = { ...base, allowed: true };
    }

    this.record(decision, request);
    return decision;
  }

  protected override handleListenerError(
    error: Error,
    callbackName: string,
  ): void {
    this.logger.errorObject(`Permission ${callbackName} failed`, error);
  }

  private record(decision: PermissionDecision, request: PermissionRequest): void {
    const params = {
      operation: decision.operation,
      level: decision.currentLevel,
      requiredLevel: decision.requiredLevel,
      requestedBy: request.requestedBy ?? 'unknown',
    };

    if (!this.auditLogging) {
      this.logger.debug('Permission decision for {{operation}}: {{outcome}}', {
        params: { ...params, outcome: decision.allowed ? 'allowed' : 'denied' },
      });
    } else {
      if (decision.allowed) {
        this.logger.info(
          'Allowed {{operation}} for {{requestedBy}} at level {{level}}',
          { params, tags: ['audit'] },
        );
      } else {
        this.logger.warn(
          'Denied {{operation}} for {{requestedBy}} at level {{level}} ({{reason}})',
          { params: { ...params, reason: decision.reason }, tags: ['audit'] },
        );
      }
    }

    this.emit('action:permission-decision', {
      decision,
      requestedBy: request.requestedBy,
      correlationId: request.correlationId,
      timestamp: Date.now(),
    });
  }
}
