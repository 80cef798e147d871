// src/kernel-core/L1/Identity.ts
import { silentLogger } from '../L0/Logger.js';
import type { Logger } from '../L0/Logger.js';

export type UnitName = string;

/**
 * Structural distance between two units. Lower is closer.
 */
export enum Relationship {
    SELF = 0,
    DIRECT_DEPENDENCY = 1,
    TRANSITIVELY_REACHABLE = 2,
    UNRELATED = 3
}

/**
 * Unit Directory Port
 * The registry collaborator the resolver and the navigation coordinator read from.
 */
export interface IUnitDirectory {
    currentIdentity(): UnitName;
    has(name: UnitName): boolean;
    dependenciesOf(name: UnitName): ReadonlySet<UnitName>;
    isActive(name: UnitName): boolean;
}

export interface IdentityProvider {
    identityOf(): UnitName;
    relationshipBetween(from: UnitName, to: UnitName): Relationship;
}

/**
 * Used when no directory is configured: every pair is unrelated.
 */
export class AnonymousIdentityProvider implements IdentityProvider {
    public static readonly IDENTITY = 'anonymous';

    public identityOf(): UnitName {
        return AnonymousIdentityProvider.IDENTITY;
    }

    public relationshipBetween(_from: UnitName, _to: UnitName): Relationship {
        return Relationship.UNRELATED;
    }
}

/**
 * Relationship Resolver
 * Classifies pairs by walking the dependency graph breadth-first. Results are
 * memoized per (from, to) for the lifetime of the instance; owners call
 * `invalidate()` after mutating the graph.
 */
export class RelationshipResolver implements IdentityProvider {
    private cache: Map<string, Relationship> = new Map();
    private readonly logger: Logger;

    constructor(private directory: IUnitDirectory, logger: Logger = silentLogger) {
        this.logger = logger.child('identity');
    }

    public get cacheSize(): number { return this.cache.size; }

    public identityOf(): UnitName {
        return this.directory.currentIdentity();
    }

    public relationshipBetween(from: UnitName, to: UnitName): Relationship {
        const key = RelationshipResolver.key(from, to);
        const cached = this.cache.get(key);
        if (cached !== undefined) return cached;

        // Absence is not an error; unknown units are not memoized so a later
        // registration is picked up.
        if (!this.directory.has(from) || !this.directory.has(to)) {
            return Relationship.UNRELATED;
        }

        const relationship = this.classify(from, to);
        this.cache.set(key, relationship);
        this.logger.debug(`${from} -> ${to}: ${Relationship[relationship]}`);
        return relationship;
    }

    public invalidate() {
        this.cache.clear();
    }

    private classify(from: UnitName, to: UnitName): Relationship {
        if (from === to) return Relationship.SELF;

        const direct = this.directory.dependenciesOf(from);
        if (direct.has(to)) return Relationship.DIRECT_DEPENDENCY;

        const seen = new Set<UnitName>([from]);
        const queue: UnitName[] = [from];
        let head = 0;

        while (head < queue.length) {
            const current = queue[head++];
            if (current === undefined) break;

            for (const dep of this.directory.dependenciesOf(current)) {
                if (dep === to) return Relationship.TRANSITIVELY_REACHABLE;
                if (seen.has(dep)) continue;
                seen.add(dep);
                queue.push(dep);
            }
        }
        return Relationship.UNRELATED;
    }

    private static key(from: UnitName, to: UnitName): string {
        return `${from}\u0000${to}`;
    }
}
