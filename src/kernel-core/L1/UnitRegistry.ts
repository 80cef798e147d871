// src/kernel-core/L1/UnitRegistry.ts
import { UnitError } from '../Errors.js';
import { silentLogger } from '../L0/Logger.js';
import type { Logger } from '../L0/Logger.js';
import { AnonymousIdentityProvider } from './Identity.js';
import type { IUnitDirectory, UnitName } from './Identity.js';

/**
 * Unit Lifecycle States
 */
export type UnitLifecycle =
    | 'REGISTERED'  // Known to the registry, not initialized
    | 'ACTIVE'      // Initialized and reachable
    | 'SUSPENDED'   // Initialized, temporarily unreachable
    | 'DISPOSED';   // Removed from service, cannot be reactivated

export interface UnitDefinition {
    name: UnitName;
    dependencies?: UnitName[];
    onInit?: () => void | Promise<void>;
    onDispose?: () => void | Promise<void>;
}

export interface Unit {
    readonly name: UnitName;
    readonly dependencies: ReadonlySet<UnitName>;
    lifecycle: UnitLifecycle;
    readonly definition: UnitDefinition;
}

const EMPTY: ReadonlySet<UnitName> = new Set();

/**
 * Unit Registry
 * Tracks units, their dependency edges and lifecycle, and which unit is current.
 */
export class UnitRegistry implements IUnitDirectory {
    private units: Map<UnitName, Unit> = new Map();
    private current: UnitName | undefined;
    private readonly listeners: Array<(unit: Unit) => void> = [];
    private readonly logger: Logger;

    constructor(logger: Logger = silentLogger) {
        this.logger = logger.child('units');
    }

    public register(definition: UnitDefinition): Unit {
        if (!definition.name) {
            throw new UnitError('UnitRegistry: name is required');
        }
        if (this.units.has(definition.name)) {
            throw new UnitError(`UnitRegistry: Unit ${definition.name} already registered`, { unit: definition.name });
        }

        const unit: Unit = {
            name: definition.name,
            dependencies: new Set(definition.dependencies ?? []),
            lifecycle: 'REGISTERED',
            definition
        };
        this.units.set(unit.name, unit);
        this.logger.info(`Registered unit ${unit.name}`);
        for (const listener of this.listeners) listener(unit);
        return unit;
    }

    /**
     * Subscribes to registrations. Graph caches use this to invalidate.
     */
    public onRegister(listener: (unit: Unit) => void) {
        this.listeners.push(listener);
    }

    public get(name: UnitName): Unit | undefined {
        return this.units.get(name);
    }

    public getAll(): Unit[] {
        return Array.from(this.units.values());
    }

    public has(name: UnitName): boolean {
        return this.units.has(name);
    }

    public dependenciesOf(name: UnitName): ReadonlySet<UnitName> {
        return this.units.get(name)?.dependencies ?? EMPTY;
    }

    public isActive(name: UnitName): boolean {
        return this.units.get(name)?.lifecycle === 'ACTIVE';
    }

    /**
     * Falls back to the anonymous identity until a current unit is set.
     */
    public currentIdentity(): UnitName {
        return this.current ?? AnonymousIdentityProvider.IDENTITY;
    }

    public setCurrent(name: UnitName) {
        if (!this.units.has(name)) {
            throw new UnitError(`UnitRegistry: Unit ${name} not found`, { unit: name });
        }
        this.current = name;
    }

    /**
     * Dependencies first. Throws on a missing dependency or a cycle.
     */
    public initializationOrder(): Unit[] {
        const sorted: Unit[] = [];
        const resolved = new Set<UnitName>();

        const visit = (unit: Unit, path: UnitName[]) => {
            if (path.includes(unit.name)) {
                throw new UnitError(
                    `UnitRegistry: Circular dependency ${[...path, unit.name].join(' -> ')}`,
                    { cycle: [...path, unit.name] }
                );
            }
            if (resolved.has(unit.name)) return;

            for (const depName of unit.dependencies) {
                const dep = this.units.get(depName);
                if (!dep) {
                    throw new UnitError(`UnitRegistry: Missing dependency ${depName} of ${unit.name}`, { unit: unit.name, dependency: depName });
                }
                visit(dep, [...path, unit.name]);
            }
            sorted.push(unit);
            resolved.add(unit.name);
        };

        for (const unit of this.units.values()) visit(unit, []);
        return sorted;
    }

    /**
     * Initializes every registered unit in dependency order.
     */
    public async initialize(): Promise<void> {
        for (const unit of this.initializationOrder()) {
            if (unit.lifecycle === 'REGISTERED') {
                await this.activate(unit.name);
            }
        }
    }

    /**
     * REGISTERED → ACTIVE (runs onInit) or SUSPENDED → ACTIVE
     */
    public async activate(name: UnitName): Promise<void> {
        const unit = this.require(name);
        if (unit.lifecycle === 'ACTIVE') return;
        if (unit.lifecycle === 'DISPOSED') {
            throw new UnitError(`UnitRegistry: Cannot activate unit in state ${unit.lifecycle}`, { unit: name });
        }

        for (const depName of unit.dependencies) {
            if (!this.isActive(depName)) {
                throw new UnitError(`UnitRegistry: Dependency ${depName} of ${name} is not ACTIVE`, { unit: name, dependency: depName });
            }
        }

        if (unit.lifecycle === 'REGISTERED' && unit.definition.onInit) {
            await unit.definition.onInit();
        }
        unit.lifecycle = 'ACTIVE';
        this.logger.info(`Activated unit ${name}`);
    }

    /**
     * ACTIVE → SUSPENDED
     */
    public suspend(name: UnitName): void {
        const unit = this.require(name);
        if (unit.lifecycle !== 'ACTIVE') {
            throw new UnitError(`UnitRegistry: Cannot suspend unit in state ${unit.lifecycle}`, { unit: name });
        }
        unit.lifecycle = 'SUSPENDED';
        this.logger.info(`Suspended unit ${name}`);
    }

    /**
     * Any state → DISPOSED
     */
    public async dispose(name: UnitName): Promise<void> {
        const unit = this.require(name);
        if (unit.lifecycle === 'DISPOSED') return;

        unit.lifecycle = 'DISPOSED';
        if (this.current === name) this.current = undefined;
        if (unit.definition.onDispose) {
            await unit.definition.onDispose();
        }
        this.logger.info(`Disposed unit ${name}`);
    }

    private require(name: UnitName): Unit {
        const unit = this.units.get(name);
        if (!unit) {
            throw new UnitError(`UnitRegistry: Unit ${name} not found`, { unit: name });
        }
        return unit;
    }
}
