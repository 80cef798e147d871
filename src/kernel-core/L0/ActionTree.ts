// src/kernel-core/L0/ActionTree.ts
import { ActionNotFoundError, DuplicateActionError, InvalidActionPathError } from '../Errors.js';
import { closestMatch } from './EditDistance.js';
import { silentLogger } from './Logger.js';
import type { Logger } from './Logger.js';

/**
 * Execution Context
 * One per dispatch. Handlers may replace `payload` for the rest of the chain;
 * `lastResult` holds the value returned by the previous handler.
 */
export interface ExecutionContext {
    payload: unknown;
    lastResult: unknown;
    readonly action: string;
    readonly path: readonly string[];
    cursor: number;
}

export type ActionHandler = (ctx: ExecutionContext) => unknown;

export type NodeID = number;

interface ActionNode {
    readonly id: NodeID;
    readonly name: string;
    readonly depth: number;
    readonly children: Map<string, NodeID>;
    handler?: ActionHandler;
}

export interface ActionTreeOptions {
    separator?: string;
    logger?: Logger;
}

const ROOT: NodeID = 0;

/**
 * Action Tree (IMC Dispatcher)
 * Nodes live in an arena indexed by id; each node maps child segment names to ids.
 * Calling `a.b.c` runs the handlers found at `a`, `a.b` and `a.b.c`, in that order.
 *
 * Not synchronized: registration and dispatch on the same subtree must not interleave.
 */
export class ActionTree {
    public readonly separator: string;
    private readonly nodes: ActionNode[] = [];
    private readonly logger: Logger;
    private handlers = 0;

    constructor(options: ActionTreeOptions = {}) {
        this.separator = options.separator ?? '.';
        if (this.separator.length === 0) {
            throw new RangeError('ActionTree: separator cannot be empty');
        }
        this.logger = (options.logger ?? silentLogger).child('imc');
        this.nodes.push({ id: ROOT, name: '', depth: 0, children: new Map() });
    }

    /**
     * Number of registered handlers.
     */
    public get size(): number { return this.handlers; }

    public register(path: string, handler: ActionHandler): void {
        const segments = this.split(path);

        let node = this.node(ROOT);
        for (const segment of segments) {
            const childId = node.children.get(segment);
            if (childId === undefined) {
                const child: ActionNode = {
                    id: this.nodes.length,
                    name: segment,
                    depth: node.depth + 1,
                    children: new Map()
                };
                this.nodes.push(child);
                node.children.set(segment, child.id);
                node = child;
            } else {
                node = this.node(childId);
            }
        }

        if (node.handler) {
            throw new DuplicateActionError(path);
        }
        node.handler = handler;
        this.handlers++;
        this.logger.debug(`Registered action '${path}'`);
    }

    public has(path: string): boolean {
        const id = this.find(this.split(path));
        return id !== undefined && this.node(id).handler !== undefined;
    }

    /**
     * Registered handler paths, depth-first in registration order.
     */
    public paths(): string[] {
        const out: string[] = [];
        const visit = (node: ActionNode, prefix: string[]) => {
            const here = node.id === ROOT ? prefix : [...prefix, node.name];
            if (node.handler) out.push(here.join(this.separator));
            for (const childId of node.children.values()) {
                visit(this.node(childId), here);
            }
        };
        visit(this.node(ROOT), []);
        return out;
    }

    /**
     * Resolves the whole chain before any handler runs, so an unknown segment
     * fails without side effects.
     */
    public async call(path: string, payload?: unknown): Promise<unknown> {
        const segments = this.split(path);
        const chain = this.resolve(path, segments);

        const ctx: ExecutionContext = {
            payload,
            lastResult: undefined,
            action: path,
            path: segments,
            cursor: 0
        };

        for (const node of chain) {
            ctx.cursor = node.depth - 1;
            if (node.handler) {
                ctx.lastResult = await node.handler(ctx);
            }
        }

        this.logger.debug(`Executed '${path}' (${chain.filter(n => n.handler).length} handlers)`);
        return ctx.lastResult;
    }

    private resolve(path: string, segments: string[]): ActionNode[] {
        const chain: ActionNode[] = [];
        let node = this.node(ROOT);

        for (const segment of segments) {
            const childId = node.children.get(segment);
            if (childId === undefined) {
                const suggestion = closestMatch(segment, node.children.keys());
                this.logger.warning(`Unknown action segment '${segment}' in '${path}'`);
                throw new ActionNotFoundError(path, segment, suggestion);
            }
            node = this.node(childId);
            chain.push(node);
        }
        return chain;
    }

    private find(segments: string[]): NodeID | undefined {
        let id: NodeID | undefined = ROOT;
        for (const segment of segments) {
            id = this.node(id).children.get(segment);
            if (id === undefined) return undefined;
        }
        return id;
    }

    private split(path: string): string[] {
        if (path.length === 0) throw new InvalidActionPathError(path);
        const segments = path.split(this.separator);
        if (segments.some(s => s.length === 0)) throw new InvalidActionPathError(path);
        return segments;
    }

    private node(id: NodeID): ActionNode {
        const node = this.nodes[id];
        if (!node) throw new RangeError(`ActionTree: unknown node ${id}`);
        return node;
    }
}
