/**
 * modgate Kernel Error Taxonomy
 * Centralized error codes for dispatch, navigation and policy failures.
 */

export enum ErrorCode {
    // I. Dispatch (IMC)
    INVALID_ACTION_PATH = 'INVALID_ACTION_PATH',
    DUPLICATE_ACTION = 'DUPLICATE_ACTION',
    ACTION_NOT_FOUND = 'ACTION_NOT_FOUND',
    DUPLICATE_CONTRACT = 'DUPLICATE_CONTRACT',
    CONTRACT_NOT_FOUND = 'CONTRACT_NOT_FOUND',

    // II. Navigation
    EMPTY_HISTORY = 'EMPTY_HISTORY',
    ALREADY_RESOLVED = 'ALREADY_RESOLVED',
    UNIT_NOT_ACTIVE = 'UNIT_NOT_ACTIVE',

    // III. Units & Events
    UNIT_ERROR = 'UNIT_ERROR',
    INVALID_CHANNEL = 'INVALID_CHANNEL',

    // IV. Access Policy
    POLICY_VIOLATION = 'POLICY_VIOLATION',

    // V. Lifecycle & Configuration
    DISPOSED = 'DISPOSED',
    INVALID_CONFIG = 'INVALID_CONFIG',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[modgate:${code}] ${message}`);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown for an empty path or a path with an empty segment.
 */
export class InvalidActionPathError extends KernelError {
    constructor(public readonly path: string) {
        super(ErrorCode.INVALID_ACTION_PATH, `Invalid action path '${path}'`, { path });
    }
}

export class DuplicateActionError extends KernelError {
    constructor(public readonly path: string) {
        super(ErrorCode.DUPLICATE_ACTION, `Action '${path}' is already registered`, { path });
    }
}

/**
 * Thrown when a path segment has no matching node. Carries the closest
 * sibling name when the node has children.
 */
export class ActionNotFoundError extends KernelError {
    constructor(
        public readonly path: string,
        public readonly segment: string,
        public readonly suggestion?: string
    ) {
        super(
            ErrorCode.ACTION_NOT_FOUND,
            `No action '${segment}' in '${path}'` + (suggestion !== undefined ? `, did you mean '${suggestion}'?` : ''),
            { path, segment, suggestion }
        );
    }
}

export class DuplicateContractError extends KernelError {
    constructor(public readonly contract: string) {
        super(ErrorCode.DUPLICATE_CONTRACT, `Contract ${contract} is already registered`, { contract });
    }
}

export class ContractNotFoundError extends KernelError {
    constructor(public readonly contract: string) {
        super(ErrorCode.CONTRACT_NOT_FOUND, `Contract ${contract} not found`, { contract });
    }
}

export class EmptyHistoryError extends KernelError {
    constructor(operation: string) {
        super(ErrorCode.EMPTY_HISTORY, `Cannot ${operation}: history is empty`, { operation });
    }
}

export class AlreadyResolvedError extends KernelError {
    constructor(public readonly unitName: string) {
        super(ErrorCode.ALREADY_RESOLVED, `Bad state: entry for ${unitName} is already resolved`, { unitName });
    }
}

export class UnitNotActiveError extends KernelError {
    constructor(public readonly unitName: string) {
        super(ErrorCode.UNIT_NOT_ACTIVE, `Unit ${unitName} is not registered or not active`, { unitName });
    }
}

export class UnitError extends KernelError {
    constructor(message: string, metadata?: Record<string, unknown>) {
        super(ErrorCode.UNIT_ERROR, message, metadata);
    }
}

export class InvalidChannelError extends KernelError {
    constructor(public readonly channel: string) {
        super(ErrorCode.INVALID_CHANNEL, `Invalid event channel '${channel}'`, { channel });
    }
}

/**
 * Raised by callers that treat a denied authorization as fatal.
 */
export class PolicyViolationError extends KernelError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ErrorCode.POLICY_VIOLATION, message, details);
    }
}

export class DisposedError extends KernelError {
    constructor(public readonly component: string) {
        super(ErrorCode.DISPOSED, `${component} was disposed`, { component });
    }
}

export class ConfigError extends KernelError {
    constructor(message: string, public readonly field: string) {
        super(ErrorCode.INVALID_CONFIG, message, { field });
    }
}
