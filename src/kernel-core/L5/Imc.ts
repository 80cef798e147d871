// src/kernel-core/L5/Imc.ts
import { DisposedError, PolicyViolationError } from '../Errors.js';
import { ActionTree } from '../L0/ActionTree.js';
import type { ActionHandler } from '../L0/ActionTree.js';
import { ContractRegistry } from '../L0/ContractRegistry.js';
import type { ContractClass, ImcContract } from '../L0/ContractRegistry.js';
import { silentLogger } from '../L0/Logger.js';
import type { Logger } from '../L0/Logger.js';
import type { IdentityProvider } from '../L1/Identity.js';
import type { PolicyEngine } from '../L2/Policy.js';

export interface ImcOptions {
    separator?: string;
    logger?: Logger;
    /** Both must be set for calls to be authorized */
    policy?: PolicyEngine;
    identity?: IdentityProvider;
}

/**
 * IMC (Inter-Module Communication)
 * String dispatch through the action tree plus typed contracts. With a policy
 * engine configured, a call is an EMIT from the current unit to the unit named
 * by the first path segment, and a denial is fatal for that call.
 */
export class Imc {
    private readonly tree: ActionTree;
    private readonly contracts = new ContractRegistry();
    private readonly logger: Logger;
    private disposed = false;

    constructor(private options: ImcOptions = {}) {
        this.logger = (options.logger ?? silentLogger).child('imc');
        this.tree = new ActionTree({ separator: options.separator, logger: options.logger });
    }

    public get separator(): string { return this.tree.separator; }

    public register(path: string, handler: ActionHandler): void {
        this.ensureAlive();
        this.tree.register(path, handler);
    }

    public has(path: string): boolean {
        this.ensureAlive();
        return this.tree.has(path);
    }

    public paths(): string[] {
        this.ensureAlive();
        return this.tree.paths();
    }

    public async call(path: string, payload?: unknown): Promise<unknown> {
        this.ensureAlive();
        this.authorize(path);
        return this.tree.call(path, payload);
    }

    public put<T extends ImcContract>(contract: T): void {
        this.ensureAlive();
        this.contracts.put(contract);
        this.logger.info(`Published contract ${contract.constructor.name} for ${contract.unitName}`);
    }

    public get<T extends ImcContract>(ctor: ContractClass<T>): T {
        this.ensureAlive();
        return this.contracts.get(ctor);
    }

    public dispose() {
        if (this.disposed) return;
        this.disposed = true;
        this.contracts.clear();
        this.logger.info('Disposed');
    }

    private authorize(path: string) {
        const { policy, identity } = this.options;
        // Malformed paths are rejected by the tree
        if (!policy || !identity || path.length === 0) return;

        const target = path.split(this.tree.separator)[0] ?? path;
        const sender = identity.identityOf();
        const decision = policy.check('EMIT', sender, target, path, this.tree.separator);
        if (!decision.ok) {
            throw new PolicyViolationError(`Call '${path}' denied: ${decision.violation}`, {
                sender,
                receiver: target,
                code: decision.code
            });
        }
    }

    private ensureAlive() {
        if (this.disposed) throw new DisposedError('Imc');
    }
}
