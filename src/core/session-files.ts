import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ChatNode, NodeRecordSchema } from "./chat-node.js";
import { MalformedTreeError, SessionFileError } from "./errors.js";
import { assertParentsPresent, type TreeState } from "./remote-sync.js";
import { TreeStore } from "./tree-store.js";

const NullableId = Type.Union([Type.String(), Type.Null()]);

export const SessionSnapshotSchema = Type.Object({
	conversationId: NullableId,
	treeId: NullableId,
	rootId: NullableId,
	currentQuestionId: NullableId,
	currentAnswerId: NullableId,
	nodes: Type.Array(NodeRecordSchema),
});

export type SessionSnapshot = Static<typeof SessionSnapshotSchema>;

export interface SessionFileInfo {
	path: string;
	conversationId: string | null;
	messageCount: number;
	firstMessage: string;
	modified: Date;
}

export const EMPTY_SNAPSHOT: SessionSnapshot = {
	conversationId: null,
	treeId: null,
	rootId: null,
	currentQuestionId: null,
	currentAnswerId: null,
	nodes: [],
};

// ============================================================================
// Snapshot <-> TreeState
// ============================================================================

export function parseSnapshot(value: unknown): SessionSnapshot {
	if (!Value.Check(SessionSnapshotSchema, value)) {
		const first = Value.Errors(SessionSnapshotSchema, value).First();
		const where = first ? ` at '${first.path || "/"}': ${first.message}` : "";
		throw new MalformedTreeError(`Invalid session snapshot${where}`);
	}
	return value;
}

export function snapshotFromState(state: TreeState | null): SessionSnapshot {
	if (!state) return { ...EMPTY_SNAPSHOT, nodes: [] };
	return {
		conversationId: state.conversationId,
		treeId: state.treeId,
		rootId: state.rootId,
		currentQuestionId: state.currentQuestionId,
		currentAnswerId: state.currentAnswerId,
		nodes: [...state.store.values()].map((node) => node.toJSON()),
	};
}

/**
 * Rebuild a tree from a snapshot. Returns null for an empty session.
 */
export function stateFromSnapshot(snapshot: SessionSnapshot): TreeState | null {
	const { conversationId, treeId, rootId, currentQuestionId, currentAnswerId, nodes } = snapshot;

	if (nodes.length === 0) {
		if (conversationId !== null || treeId !== null || rootId !== null || currentQuestionId !== null || currentAnswerId !== null) {
			throw new MalformedTreeError("Snapshot has pointers but no nodes.");
		}
		return null;
	}

	if (treeId === null || rootId === null || currentQuestionId === null || currentAnswerId === null) {
		throw new MalformedTreeError("Snapshot has nodes but is missing tree pointers.");
	}

	const store = new TreeStore(nodes.map((record) => new ChatNode(record)));
	for (const id of [treeId, rootId, currentQuestionId, currentAnswerId]) {
		if (!store.has(id)) {
			throw new MalformedTreeError(`Snapshot pointer '${id}' does not reference a node.`);
		}
	}
	assertParentsPresent(store);
	assertPointerPair(store, treeId, rootId, currentQuestionId, currentAnswerId);

	return { store, conversationId, treeId, rootId, currentQuestionId, currentAnswerId };
}

function assertPointerPair(
	store: TreeStore,
	treeId: string,
	rootId: string,
	currentQuestionId: string,
	currentAnswerId: string,
): void {
	const anchor = store.get(treeId);
	if (anchor.parent !== null || anchor.hasMessage()) {
		throw new MalformedTreeError(`Snapshot anchor '${treeId}' must have no parent and no message.`);
	}
	if (store.get(rootId).parent !== treeId) {
		throw new MalformedTreeError(`Snapshot root '${rootId}' does not hang off the anchor '${treeId}'.`);
	}

	let depth: number | null;
	try {
		depth = store.depthFrom(rootId, currentAnswerId);
	} catch (error) {
		throw new MalformedTreeError(`Cannot walk from '${currentAnswerId}' to the root.`, { cause: error });
	}
	if (depth === null || depth % 2 === 1) {
		throw new MalformedTreeError(`Snapshot answer pointer '${currentAnswerId}' is not an answer below the root.`);
	}
	if (store.get(currentAnswerId).parent !== currentQuestionId) {
		throw new MalformedTreeError(
			`Snapshot question pointer '${currentQuestionId}' is not the parent of answer '${currentAnswerId}'.`,
		);
	}
}

// ============================================================================
// Files
// ============================================================================

export function getSessionFilePath(sessionsDir: string, conversationId: string): string {
	return join(sessionsDir, `${conversationId}.json`);
}

export function saveSessionFile(path: string, snapshot: SessionSnapshot): string {
	const file = resolve(path);
	const dir = dirname(file);
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true });
	}
	writeFileSync(file, JSON.stringify(snapshot, null, 2), "utf-8");
	return file;
}

export function loadSessionFile(path: string): SessionSnapshot {
	if (!existsSync(path)) {
		throw new SessionFileError(`Session file not found: ${path}`);
	}

	let content: unknown;
	try {
		content = JSON.parse(readFileSync(path, "utf-8"));
	} catch (error) {
		throw new SessionFileError(`Session file is not valid JSON: ${path}`, { cause: error });
	}
	return parseSnapshot(content);
}

function describeSnapshot(path: string, snapshot: SessionSnapshot, modified: Date): SessionFileInfo {
	const messageNodes = snapshot.nodes.filter((node) => node.message !== null);
	// First question hangs directly off the root
	const firstQuestion = snapshot.nodes.find((node) => node.parent !== null && node.parent === snapshot.rootId);

	return {
		path,
		conversationId: snapshot.conversationId,
		messageCount: messageNodes.length,
		firstMessage: firstQuestion?.message || "(no messages)",
		modified,
	};
}

/** List saved sessions in a directory, most recently modified first */
export function listSessionFiles(sessionsDir: string): SessionFileInfo[] {
	if (!existsSync(sessionsDir)) return [];

	const sessions: SessionFileInfo[] = [];
	const files = readdirSync(sessionsDir)
		.filter((f) => f.endsWith(".json"))
		.map((f) => join(sessionsDir, f));

	for (const file of files) {
		try {
			const snapshot = loadSessionFile(file);
			sessions.push(describeSnapshot(file, snapshot, statSync(file).mtime));
		} catch {
			// Skip files that are not session snapshots
		}
	}

	return sessions.sort((a, b) => b.modified.getTime() - a.modified.getTime());
}
