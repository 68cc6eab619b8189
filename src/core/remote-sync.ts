/**
 * Remote Sync - rebuild a navigable tree from a fetched conversation.
 *
 * The backend returns the conversation as an unordered `mapping` of raw nodes.
 * Every entry is normalized into a fresh store, then the session pointers are
 * recovered by walking parent links from the current node up to the anchor.
 *
 * The walk starts from, in order:
 * 1. an explicitly requested node id
 * 2. the server-declared `current_node`
 * 3. the anchor
 * and continues forward through the last-appended child until a leaf, which
 * must be an answer.
 */

import { ChatNode } from "./chat-node.js";
import type { RemoteConversation } from "./backend.js";
import { CycleDetectedError, MalformedTreeError, UnknownNodeError } from "./errors.js";
import { TreeStore } from "./tree-store.js";

/** Everything a session needs to take over a tree */
export interface TreeState {
	store: TreeStore;
	conversationId: string | null;
	/** Structural anchor (no message, no parent) */
	treeId: string;
	/** First real node below the anchor */
	rootId: string;
	currentQuestionId: string;
	currentAnswerId: string;
}

export interface ReconcileOptions {
	/** Overrides the server-declared current node */
	currentNodeId?: string;
	/** Used when the payload itself carries no conversation id */
	conversationId?: string;
}

// ============================================================================
// Helpers
// ============================================================================

/** Normalize a raw mapping into a store. Mapping keys stand in for missing ids. */
export function buildStoreFromMapping(mapping: Record<string, unknown>): TreeStore {
	const store = new TreeStore();
	for (const [key, raw] of Object.entries(mapping)) {
		store.insert(ChatNode.from(raw, { fallbackId: key }));
	}
	return store;
}

/** Every non-anchor node must point at a parent that exists */
export function assertParentsPresent(store: TreeStore): void {
	for (const node of store.values()) {
		if (node.parent !== null && !store.has(node.parent)) {
			throw new MalformedTreeError(`Node '${node.id}' references missing parent '${node.parent}'.`);
		}
	}
}

export function findAnchor(store: TreeStore): ChatNode {
	const parentless = [...store.values()].filter((node) => node.parent === null);
	if (parentless.length !== 1) {
		throw new MalformedTreeError(`Expected exactly one parentless node, found ${parentless.length}.`);
	}
	const anchor = parentless[0];
	if (anchor.hasMessage()) {
		throw new MalformedTreeError(`Top node '${anchor.id}' carries a message; expected a structural anchor.`);
	}
	return anchor;
}

/**
 * Follow the most recent branch from `fromId` down to a leaf.
 * Children that are not in the store are ignored.
 */
export function latestLeaf(store: TreeStore, fromId: string): string {
	const visited = new Set<string>();
	let current = store.get(fromId);
	while (true) {
		if (visited.has(current.id)) {
			throw new CycleDetectedError(current.id);
		}
		visited.add(current.id);
		const next = [...current.children].reverse().find((id) => store.has(id));
		if (next === undefined) return current.id;
		current = store.get(next);
	}
}

/**
 * Recover anchor, root and the active pointer pair for `currentId`.
 */
export function resolvePointers(
	store: TreeStore,
	currentId: string,
): Pick<TreeState, "treeId" | "rootId" | "currentQuestionId" | "currentAnswerId"> {
	if (!store.has(currentId)) {
		throw new MalformedTreeError(`Current node '${currentId}' is not part of the conversation.`);
	}

	let path: string[];
	try {
		path = store.pathTo(currentId);
	} catch (error) {
		if (error instanceof UnknownNodeError) {
			throw new MalformedTreeError(`Missing node '${error.nodeId}' on the path to '${currentId}'.`, {
				cause: error,
			});
		}
		throw error;
	}

	const [treeId, rootId] = path;
	if (store.get(treeId).hasMessage()) {
		throw new MalformedTreeError(`Top node '${treeId}' carries a message; expected a structural anchor.`);
	}
	if (rootId === undefined) {
		throw new MalformedTreeError("Conversation has no messages below its anchor.");
	}
	// path[1] is the root; answers sit an even number of steps below it
	if ((path.length - 2) % 2 === 1) {
		throw new MalformedTreeError(`Current node '${currentId}' is an unanswered question.`);
	}

	return {
		treeId,
		rootId,
		currentQuestionId: path[path.length - 2],
		currentAnswerId: currentId,
	};
}

// ============================================================================
// Reconciliation
// ============================================================================

export function reconcileConversation(conversation: RemoteConversation, options: ReconcileOptions = {}): TreeState {
	const store = buildStoreFromMapping(conversation.mapping);
	assertParentsPresent(store);

	const declared = options.currentNodeId ?? conversation.current_node ?? undefined;
	if (declared !== undefined && !store.has(declared)) {
		throw new MalformedTreeError(`Current node '${declared}' is not part of the conversation.`);
	}
	const currentId = latestLeaf(store, declared ?? findAnchor(store).id);

	return {
		store,
		conversationId: conversation.conversation_id ?? options.conversationId ?? null,
		...resolvePointers(store, currentId),
	};
}
