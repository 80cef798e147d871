// src/Platform/ModularPlatform.ts
import { Logger } from '../kernel-core/L0/Logger.js';
import type { ILogSink } from '../kernel-core/L0/Logger.js';
import { RelationshipResolver } from '../kernel-core/L1/Identity.js';
import type { UnitName } from '../kernel-core/L1/Identity.js';
import { UnitRegistry } from '../kernel-core/L1/UnitRegistry.js';
import type { UnitDefinition } from '../kernel-core/L1/UnitRegistry.js';
import { PolicyEngine } from '../kernel-core/L2/Policy.js';
import type { Policy } from '../kernel-core/L2/Policy.js';
import { EventBus } from '../kernel-core/L3/Events.js';
import { NavigationCoordinator } from '../kernel-core/L4/Navigation.js';
import { Imc } from '../kernel-core/L5/Imc.js';
import { resolveConfig } from './Config.js';
import type { Environment, PlatformConfig } from './Config.js';

export interface PlatformOptions {
    config?: Partial<PlatformConfig>;
    env?: Environment;
    sinks?: ILogSink[];
    defaultPolicy?: Policy;
}

/**
 * ModularPlatform: the composition root.
 * Wires the unit registry, relationship resolver, policy engine, event bus,
 * IMC and navigation coordinator around one logger and one configuration.
 */
export class ModularPlatform {
    public readonly config: PlatformConfig;
    public readonly logger: Logger;
    public readonly units: UnitRegistry;
    public readonly identity: RelationshipResolver;
    public readonly policy: PolicyEngine;
    public readonly events: EventBus;
    public readonly imc: Imc;
    public readonly router: NavigationCoordinator;

    constructor(options: PlatformOptions = {}) {
        this.config = resolveConfig(options.config, options.env);
        this.logger = new Logger(this.config.logLevel, options.sinks);

        this.units = new UnitRegistry(this.logger);
        this.identity = new RelationshipResolver(this.units, this.logger);
        // New edges change reachability
        this.units.onRegister(() => this.identity.invalidate());

        this.policy = new PolicyEngine(this.identity, this.logger, options.defaultPolicy);
        this.events = new EventBus({
            separator: this.config.eventSeparator,
            logger: this.logger,
            policy: this.policy,
            identity: this.identity
        });
        this.imc = new Imc({
            separator: this.config.actionSeparator,
            logger: this.logger,
            policy: this.policy,
            identity: this.identity
        });
        this.router = new NavigationCoordinator({
            maxDepth: this.config.maxHistoryDepth,
            identity: this.identity,
            channel: this.events,
            logger: this.logger,
            directory: this.config.enforceActiveUnits ? this.units : undefined
        });
    }

    public register(definition: UnitDefinition, policy?: Policy) {
        this.units.register(definition);
        if (policy) this.policy.setPolicy(definition.name, policy);
    }

    /**
     * Initializes units in dependency order and seeds navigation with `start`.
     */
    public async start(start: UnitName): Promise<void> {
        await this.units.initialize();
        this.units.setCurrent(start);
        this.router.init(start);
        this.logger.info(`Started with ${start}`);
    }

    /**
     * Navigates and makes the target the current identity.
     */
    public async navigate(unit: UnitName, value?: unknown): Promise<void> {
        await this.router.goto(unit, value);
        this.units.setCurrent(unit);
    }

    public back(value?: unknown) {
        this.router.goBack(value);
        const top = this.router.history[this.router.history.length - 1];
        if (top) this.units.setCurrent(top.unitName);
    }

    public async shutdown(): Promise<void> {
        this.router.dispose();
        this.imc.dispose();
        this.events.clear();
        for (const unit of [...this.units.initializationOrder()].reverse()) {
            await this.units.dispose(unit.name);
        }
        this.logger.info('Shutdown complete');
    }
}
