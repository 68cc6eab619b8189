/**
 * TreeStore - addressable mapping from node id to ChatNode.
 *
 * Parent references may dangle while a batch is being assembled, but every
 * mutation that runs on behalf of a session validates before it writes, so
 * a store handed back to a caller is always consistent.
 */

import type { ChatNode, ReadonlyChatNode } from "./chat-node.js";
import { CycleDetectedError, DuplicateNodeError, UnknownNodeError } from "./errors.js";

/** Query-only view of a store (what sessions expose to callers) */
export interface ReadonlyTreeStore {
	readonly size: number;
	has(id: string): boolean;
	get(id: string): ReadonlyChatNode;
	values(): IterableIterator<ReadonlyChatNode>;
	ancestorsOf(id: string): Generator<string, void, undefined>;
	descendantsOf(id: string): Generator<string, void, undefined>;
	pathTo(id: string): string[];
	depthFrom(ancestorId: string, id: string): number | null;
}

export class TreeStore implements ReadonlyTreeStore {
	private _nodes: Map<string, ChatNode> = new Map();

	constructor(nodes: Iterable<ChatNode> = []) {
		for (const node of nodes) {
			this.insert(node);
		}
	}

	get size(): number {
		return this._nodes.size;
	}

	has(id: string): boolean {
		return this._nodes.has(id);
	}

	get(id: string): ChatNode {
		const node = this._nodes.get(id);
		if (!node) {
			throw new UnknownNodeError(id);
		}
		return node;
	}

	/** Nodes in insertion order */
	values(): IterableIterator<ChatNode> {
		return this._nodes.values();
	}

	// =========================================================================
	// Mutations
	// =========================================================================

	insert(node: ChatNode): void {
		if (this._nodes.has(node.id)) {
			throw new DuplicateNodeError(node.id);
		}
		this._nodes.set(node.id, node);
	}

	/**
	 * Insert a batch atomically: either every node lands or none does.
	 */
	insertAll(nodes: readonly ChatNode[]): void {
		const seen = new Set<string>();
		for (const node of nodes) {
			if (this._nodes.has(node.id) || seen.has(node.id)) {
				throw new DuplicateNodeError(node.id);
			}
			seen.add(node.id);
		}
		for (const node of nodes) {
			this._nodes.set(node.id, node);
		}
	}

	/** Overwrite an existing node */
	replace(node: ChatNode): void {
		if (!this._nodes.has(node.id)) {
			throw new UnknownNodeError(node.id);
		}
		this._nodes.set(node.id, node);
	}

	/** Append a child id to a parent (no-op if already linked) */
	linkChild(parentId: string, childId: string): void {
		this.get(parentId).appendChild(childId);
	}

	// =========================================================================
	// Traversal
	// =========================================================================

	/**
	 * Walk parent links from `id` (inclusive) up to the parentless node.
	 */
	*ancestorsOf(id: string): Generator<string, void, undefined> {
		const visited = new Set<string>();
		let current = this.get(id);
		while (true) {
			if (visited.has(current.id)) {
				throw new CycleDetectedError(current.id);
			}
			visited.add(current.id);
			yield current.id;
			if (current.parent === null) return;
			current = this.get(current.parent);
		}
	}

	/**
	 * Pre-order walk below `id` (exclusive), oldest branch first.
	 * Children not yet inserted are skipped.
	 */
	*descendantsOf(id: string): Generator<string, void, undefined> {
		const visited = new Set<string>([id]);
		const stack = [...this.get(id).children].reverse();
		while (stack.length > 0) {
			const next = stack.pop();
			if (next === undefined) break;
			if (visited.has(next)) {
				throw new CycleDetectedError(next);
			}
			visited.add(next);
			const node = this._nodes.get(next);
			if (!node) continue;
			yield next;
			for (let i = node.children.length - 1; i >= 0; i--) {
				stack.push(node.children[i]);
			}
		}
	}

	/** Ids from the top of the tree down to `id` */
	pathTo(id: string): string[] {
		return [...this.ancestorsOf(id)].reverse();
	}

	/**
	 * Number of parent steps from `id` up to `ancestorId`,
	 * or null when `ancestorId` is not on the path.
	 */
	depthFrom(ancestorId: string, id: string): number | null {
		let depth = 0;
		for (const current of this.ancestorsOf(id)) {
			if (current === ancestorId) return depth;
			depth++;
		}
		return null;
	}
}
