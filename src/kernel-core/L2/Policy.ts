// src/kernel-core/L2/Policy.ts
import { Relationship } from '../L1/Identity.js';
import type { IdentityProvider, UnitName } from '../L1/Identity.js';
import { silentLogger } from '../L0/Logger.js';
import type { Logger } from '../L0/Logger.js';

/**
 * How far a relationship may extend before access is denied.
 * A relationship passes iff its value is <= the level's value.
 */
export enum AccessLevel {
    INTERNAL = 0,
    DEPENDENCIES = 1,
    GRAPH = 2,
    PUBLIC = 3
}

export type ActionKind = 'EMIT' | 'LISTEN' | 'RETAIN' | 'CLEAR_RETAINED' | 'CREATE_CHANNELS';

export const ALL_ACTION_KINDS: readonly ActionKind[] = ['EMIT', 'LISTEN', 'RETAIN', 'CLEAR_RETAINED', 'CREATE_CHANNELS'];

export type DenialCode = 'PERMISSION_DENIED' | 'ACCESS_LEVEL_EXCEEDED' | 'OUT_OF_SCOPE';

export interface ViolationContext {
    sender: UnitName;
    receiver: UnitName;
    kind: ActionKind;
    relationship: Relationship;
    code: DenialCode;
    path?: string;
    reason?: string;
}

export type ViolationHandler = (violation: ViolationContext) => void;

export interface PolicyScope {
    includes?: string[];
    excludes?: string[];
    overrides?: Record<string, Policy>;
}

export interface Policy {
    emitLevel: AccessLevel;
    receiveLevel: AccessLevel;
    permissions: ReadonlySet<ActionKind>;
    scope: PolicyScope;
    onViolation: ViolationHandler;
    reason?: string;
}

export interface AuthorizationContext {
    sender: UnitName;
    receiver: UnitName;
    path?: string;
    separator?: string;
}

export type Decision =
    | { ok: true; policy: Policy }
    | { ok: false; code: DenialCode; violation: string; policy: Policy };

/**
 * Receive direction applies to LISTEN only; every other kind is an emission.
 */
export function levelFor(kind: ActionKind, policy: Policy): AccessLevel {
    return kind === 'LISTEN' ? policy.receiveLevel : policy.emitLevel;
}

export function matchesPrefix(path: string, prefix: string, separator: string): boolean {
    return path === prefix || path.startsWith(prefix + separator);
}

function longestMatch(path: string, prefixes: Iterable<string>, separator: string): string | undefined {
    let best: string | undefined;
    for (const prefix of prefixes) {
        if (matchesPrefix(path, prefix, separator) && (best === undefined || prefix.length > best.length)) {
            best = prefix;
        }
    }
    return best;
}

type ScopeResolution = { policy: Policy; excludedBy?: string };

/**
 * Walks overrides from the outermost policy inwards. At each level the more
 * specific of the matching override and the matching exclude wins; an exclude
 * of the same length as an override wins.
 */
export function resolveScope(policy: Policy, path: string, separator: string): ScopeResolution {
    const exclude = longestMatch(path, policy.scope.excludes ?? [], separator);
    const overrides = policy.scope.overrides ?? {};
    const overrideKey = longestMatch(path, Object.keys(overrides), separator);
    const override = overrideKey === undefined ? undefined : overrides[overrideKey];

    if (override && overrideKey !== undefined && (exclude === undefined || overrideKey.length > exclude.length)) {
        return resolveScope(override, path, separator);
    }
    if (exclude !== undefined) {
        return { policy, excludedBy: exclude };
    }
    return { policy };
}

/**
 * Access Policy Engine
 * Decides allow/deny for an action kind given a relationship and a policy.
 * Denials are reported through the effective policy's `onViolation` and never thrown.
 */
export class PolicyEngine {
    private policies: Map<UnitName, Policy> = new Map();
    private readonly logger: Logger;

    constructor(
        private identity: IdentityProvider,
        logger: Logger = silentLogger,
        private defaultPolicy: Policy = PolicyEngine.permissive()
    ) {
        this.logger = logger.child('policy');
    }

    public static permissive(): Policy {
        return {
            emitLevel: AccessLevel.PUBLIC,
            receiveLevel: AccessLevel.PUBLIC,
            permissions: new Set(ALL_ACTION_KINDS),
            scope: {},
            onViolation: () => { },
            reason: 'Permissive default policy'
        };
    }

    public setPolicy(unit: UnitName, policy: Policy) {
        this.policies.set(unit, policy);
    }

    public policyFor(unit: UnitName): Policy {
        return this.policies.get(unit) ?? this.defaultPolicy;
    }

    public authorize(kind: ActionKind, relationship: Relationship, policy: Policy, ctx: AuthorizationContext): Decision {
        const separator = ctx.separator ?? '.';
        const scoped = ctx.path === undefined ? { policy } : resolveScope(policy, ctx.path, separator);
        const effective = scoped.policy;

        if (!effective.permissions.has(kind)) {
            return this.deny(kind, relationship, effective, ctx, 'PERMISSION_DENIED', `${kind} is not permitted`);
        }

        const level = levelFor(kind, effective);
        if (relationship > level) {
            return this.deny(
                kind, relationship, effective, ctx, 'ACCESS_LEVEL_EXCEEDED',
                `${Relationship[relationship]} exceeds ${AccessLevel[level]} for ${kind}`
            );
        }

        if (ctx.path !== undefined) {
            if (scoped.excludedBy !== undefined) {
                return this.deny(kind, relationship, effective, ctx, 'OUT_OF_SCOPE', `'${ctx.path}' is excluded by '${scoped.excludedBy}'`);
            }
            const includes = effective.scope.includes ?? [];
            if (includes.length > 0 && longestMatch(ctx.path, includes, separator) === undefined) {
                return this.deny(kind, relationship, effective, ctx, 'OUT_OF_SCOPE', `'${ctx.path}' is not included`);
            }
        }

        return { ok: true, policy: effective };
    }

    /**
     * Classifies actor against owner and authorizes against the owner's policy.
     */
    public check(kind: ActionKind, sender: UnitName, receiver: UnitName, path?: string, separator?: string): Decision {
        const relationship = this.identity.relationshipBetween(sender, receiver);
        const ctx: AuthorizationContext = { sender, receiver };
        if (path !== undefined) ctx.path = path;
        if (separator !== undefined) ctx.separator = separator;
        return this.authorize(kind, relationship, this.policyFor(receiver), ctx);
    }

    private deny(
        kind: ActionKind,
        relationship: Relationship,
        policy: Policy,
        ctx: AuthorizationContext,
        code: DenialCode,
        violation: string
    ): Decision {
        this.logger.warning(`Denied ${kind} ${ctx.sender} -> ${ctx.receiver}: ${violation}`);

        const context: ViolationContext = { sender: ctx.sender, receiver: ctx.receiver, kind, relationship, code };
        if (ctx.path !== undefined) context.path = ctx.path;
        if (policy.reason !== undefined) context.reason = policy.reason;

        try {
            policy.onViolation(context);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            this.logger.error(`onViolation callback failed: ${message}`);
        }
        return { ok: false, code, violation, policy };
    }
}
