// src/kernel-core/L0/ContractRegistry.ts
import { ContractNotFoundError, DuplicateContractError } from '../Errors.js';

/**
 * Typed alternative to string dispatch. A unit publishes a contract instance,
 * other units look it up by class.
 */
export abstract class ImcContract {
    constructor(public readonly unitName: string) { }
}

export type ContractClass<T extends ImcContract> = abstract new (...args: never[]) => T;

export class ContractRegistry {
    private contracts: Map<Function, ImcContract> = new Map();

    public put<T extends ImcContract>(contract: T): void {
        const key = contract.constructor;
        if (this.contracts.has(key)) {
            throw new DuplicateContractError(key.name);
        }
        this.contracts.set(key, contract);
    }

    public get<T extends ImcContract>(ctor: ContractClass<T>): T {
        const found = this.contracts.get(ctor);
        if (!(found instanceof ctor)) {
            throw new ContractNotFoundError(ctor.name);
        }
        return found;
    }

    public has<T extends ImcContract>(ctor: ContractClass<T>): boolean {
        return this.contracts.has(ctor);
    }

    public clear() {
        this.contracts.clear();
    }
}
