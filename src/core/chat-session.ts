/**
 * ChatSession - a navigable conversation tree bound to one backend conversation.
 *
 * The session owns a TreeStore plus the pointers that locate the active
 * exchange inside it:
 * - `treeId`: synthetic anchor above the first server node
 * - `rootId`: first server node
 * - `currentQuestionId` / `currentAnswerId`: the active pointer pair
 *
 * Asking always branches from the current answer, so moving back with
 * `goto`/`goback` and asking again grows a sibling branch instead of
 * overwriting history.
 *
 * Network-backed operations are queued and never mutate the session until
 * the response has been fully validated and staged.
 */

import { randomUUID } from "node:crypto";
import { getSessionsDir } from "../config.js";
import type { AnswerFrame, BackendApi, JsonObject } from "./backend.js";
import { ChatNode } from "./chat-node.js";
import {
	AtRootError,
	ConfigurationError,
	ConversationLockedError,
	EmptySessionError,
	InvalidMessageError,
	InvalidTargetError,
	RemoteCallError,
} from "./errors.js";
import { buildStoreFromMapping, reconcileConversation, type TreeState } from "./remote-sync.js";
import {
	getSessionFilePath,
	loadSessionFile,
	parseSnapshot,
	type SessionSnapshot,
	saveSessionFile,
	snapshotFromState,
	stateFromSnapshot,
} from "./session-files.js";
import { DEFAULT_CHAT_LIST_LIMIT, DEFAULT_MODEL } from "./settings-manager.js";
import { type ReadonlyTreeStore, TreeStore } from "./tree-store.js";

// ============================================================================
// Types
// ============================================================================

export interface ChatSessionOptions {
	/** Model slug sent with every completion. Default: DEFAULT_MODEL */
	model?: string;
	historyAndTrainingDisabled?: boolean;
	/** Page size for chatList() */
	chatListLimit?: number;
	/** Where save() writes when no path is given */
	sessionsDir?: string;
}

export interface OpenSessionOptions extends ChatSessionOptions {
	/** Answer node to activate after syncing */
	currentAnswerId?: string;
}

export interface AskOptions {
	/** When false the answer is returned but nothing is recorded. Default: true */
	keep?: boolean;
}

export type ChatLogRole = "root" | "question" | "answer";

export interface ChatLogEntry {
	id: string;
	role: ChatLogRole;
	message: string;
}

export interface ChatSummary {
	conversationId: string;
	title: string;
}

// ============================================================================
// ChatSession
// ============================================================================

export class ChatSession {
	readonly backend: BackendApi;
	readonly model: string;
	readonly historyAndTrainingDisabled: boolean;
	readonly chatListLimit: number;
	readonly sessionsDir: string;

	private _store: TreeStore = new TreeStore();
	private _conversationId: string | null = null;
	private _treeId: string | null = null;
	private _rootId: string | null = null;
	private _currentQuestionId: string | null = null;
	private _currentAnswerId: string | null = null;

	// Serializes ask/regenerate/sync
	private _queue: Promise<void> = Promise.resolve();

	constructor(backend: BackendApi, options: ChatSessionOptions = {}) {
		if (!backend.backendUrl) {
			throw new ConfigurationError("Backend URL is not set.");
		}
		if (!backend.accessToken) {
			throw new ConfigurationError("Access token is not set.");
		}
		this.backend = backend;
		this.model = options.model ?? DEFAULT_MODEL;
		this.historyAndTrainingDisabled = options.historyAndTrainingDisabled ?? false;
		this.chatListLimit = options.chatListLimit ?? DEFAULT_CHAT_LIST_LIMIT;
		this.sessionsDir = options.sessionsDir ?? getSessionsDir();
	}

	// =========================================================================
	// State Access
	// =========================================================================

	get store(): ReadonlyTreeStore {
		return this._store;
	}

	get conversationId(): string | null {
		return this._conversationId;
	}

	get treeId(): string | null {
		return this._treeId;
	}

	get rootId(): string | null {
		return this._rootId;
	}

	get currentQuestionId(): string | null {
		return this._currentQuestionId;
	}

	get currentAnswerId(): string | null {
		return this._currentAnswerId;
	}

	/** True until the first exchange has been recorded */
	get isEmpty(): boolean {
		return this._currentAnswerId === null;
	}

	// =========================================================================
	// Asking
	// =========================================================================

	/**
	 * Send a message as a child of the current answer and return the reply.
	 */
	ask(message: string, options: AskOptions = {}): Promise<string> {
		if (message.trim().length === 0) {
			return Promise.reject(new InvalidMessageError("Message must not be empty."));
		}
		const keep = options.keep ?? true;

		return this._enqueue(() => {
			const state = this._activeState();
			if (!state) return this._askFirst(message, keep);
			return this._askFrom(state.currentAnswerId, message, keep);
		});
	}

	/**
	 * Ask the current question again (or `message` in its place) from the
	 * answer that preceded it. The new exchange becomes a sibling branch.
	 */
	regenerate(message?: string): Promise<string> {
		if (message !== undefined && message.trim().length === 0) {
			return Promise.reject(new InvalidMessageError("Message must not be empty."));
		}

		return this._enqueue(() => {
			const state = this._activeState();
			if (!state) {
				throw new EmptySessionError("regenerate");
			}
			if (state.currentAnswerId === state.rootId) {
				throw new AtRootError();
			}
			const question = this._store.get(state.currentQuestionId);
			if (question.parent === null) {
				throw new AtRootError();
			}
			const text = message ?? question.message ?? "";
			if (text.trim().length === 0) {
				throw new InvalidMessageError(`Question '${question.id}' has no text to ask again.`);
			}
			return this._askFrom(question.parent, text, true);
		});
	}

	private async _askFirst(message: string, keep: boolean): Promise<string> {
		const treeId = randomUUID();
		const queId = randomUUID();

		const { ack, answer } = await this.backend.chatCompletion({
			prompt: message,
			messageId: queId,
			parentMessageId: treeId,
			model: this.model,
			historyAndTrainingDisabled: this.historyAndTrainingDisabled,
		});

		const answerNode = this._answerNode(answer, queId);
		if (!keep) return answerNode.message ?? "";

		if (!ack) {
			throw new RemoteCallError("POST /conversation: first turn returned no root acknowledgement frame");
		}

		const root = ChatNode.from({ id: ack.message.id, message: ack.message, parent: treeId, children: [queId] });
		const anchor = new ChatNode({ id: treeId, message: null, parent: null, children: [root.id] });
		const question = new ChatNode({ id: queId, message, parent: root.id, children: [answerNode.id] });

		this._store.insertAll([anchor, root, question, answerNode]);

		this._conversationId = answer.conversation_id;
		this._treeId = treeId;
		this._rootId = root.id;
		this._currentQuestionId = queId;
		this._currentAnswerId = answerNode.id;
		return answerNode.message ?? "";
	}

	private async _askFrom(parentId: string, message: string, keep: boolean): Promise<string> {
		const queId = randomUUID();

		const { answer } = await this.backend.chatCompletion({
			prompt: message,
			messageId: queId,
			parentMessageId: parentId,
			conversationId: this._conversationId ?? undefined,
			model: this.model,
			historyAndTrainingDisabled: this.historyAndTrainingDisabled,
		});

		const answerNode = this._answerNode(answer, queId);
		if (!keep) return answerNode.message ?? "";

		// Validate the attachment point before staging
		this._store.get(parentId);
		const question = new ChatNode({ id: queId, message, parent: parentId, children: [answerNode.id] });
		this._store.insertAll([question, answerNode]);
		this._store.linkChild(parentId, queId);

		this._conversationId ??= answer.conversation_id;
		this._currentQuestionId = queId;
		this._currentAnswerId = answerNode.id;
		return answerNode.message ?? "";
	}

	private _answerNode(answer: AnswerFrame, questionId: string): ChatNode {
		return ChatNode.from({ id: answer.message.id, message: answer.message, parent: questionId, children: [] });
	}

	// =========================================================================
	// Navigation
	// =========================================================================

	/**
	 * Activate an answer node. The root counts as an answer (to the anchor).
	 */
	goto(nodeId: string): void {
		const node = this._store.get(nodeId);
		if (!node.hasMessage()) {
			throw new InvalidTargetError(nodeId, "it is the tree anchor");
		}
		const state = this._activeState();
		if (!state) {
			throw new EmptySessionError("goto");
		}

		const depth = this._store.depthFrom(state.rootId, nodeId);
		if (depth === null) {
			throw new InvalidTargetError(nodeId, "it is not below the conversation root");
		}
		if (depth % 2 === 1) {
			throw new InvalidTargetError(nodeId, "it is a question, not an answer");
		}

		this._currentQuestionId = node.parent ?? state.treeId;
		this._currentAnswerId = nodeId;
	}

	/** Step back to the answer before the current question */
	goback(): void {
		const state = this._activeState();
		if (!state) {
			throw new EmptySessionError("go back");
		}
		if (state.currentAnswerId === state.rootId) {
			throw new AtRootError();
		}
		const previous = this._store.get(state.currentQuestionId).parent;
		if (previous === null) {
			throw new AtRootError();
		}
		this.goto(previous);
	}

	/** Messages from the root down to the current answer */
	chatLog(): ChatLogEntry[] {
		const state = this._activeState();
		if (!state) return [];

		const path = this._store.pathTo(state.currentAnswerId);
		const start = path.indexOf(state.rootId);
		return path.slice(start).map((id, index): ChatLogEntry => ({
			id,
			role: index === 0 ? "root" : index % 2 === 1 ? "question" : "answer",
			message: this._store.get(id).message ?? "",
		}));
	}

	/** Children of a node, oldest branch first */
	branchesOf(nodeId?: string): string[] {
		const id = nodeId ?? this._currentAnswerId;
		if (id === null) {
			throw new EmptySessionError("list branches");
		}
		return [...this._store.get(id).children];
	}

	// =========================================================================
	// Remote Sync
	// =========================================================================

	/**
	 * Replace the local tree with the server's copy of the conversation.
	 */
	syncFromRemote(conversationId?: string): Promise<void> {
		return this._enqueue(async () => {
			const target = this._requireConversationId(conversationId, "sync from remote");
			this._assertCanBind(target);

			const conversation = await this.backend.getChatById(target);
			const state = reconcileConversation(conversation, { conversationId: target });
			if (state.conversationId !== null) {
				this._assertCanBind(state.conversationId);
			}
			this._applyState(state);
		});
	}

	/** Normalized nodes of a remote conversation, keyed by id */
	async mappingById(conversationId?: string): Promise<Map<string, ChatNode>> {
		const target = this._requireConversationId(conversationId, "fetch the conversation mapping");
		const conversation = await this.backend.getChatById(target);
		const store = buildStoreFromMapping(conversation.mapping);
		return new Map([...store.values()].map((node): [string, ChatNode] => [node.id, node]));
	}

	static async open(backend: BackendApi, conversationId: string, options: OpenSessionOptions = {}): Promise<ChatSession> {
		const session = new ChatSession(backend, options);
		await session.syncFromRemote(conversationId);
		if (options.currentAnswerId !== undefined) {
			session.goto(options.currentAnswerId);
		}
		return session;
	}

	// =========================================================================
	// Account & Conversation Helpers
	// =========================================================================

	async accountStatus(): Promise<JsonObject> {
		const status = await this.backend.getAccountStatus();
		return status.account_plan;
	}

	async validModels(): Promise<string[]> {
		const models = await this.backend.getModels(this.historyAndTrainingDisabled);
		return models.categories.map((entry) => entry.category);
	}

	betaFeatures(): Promise<JsonObject> {
		return this.backend.getBetaFeatures();
	}

	async chatList(offset = 0, limit = this.chatListLimit, order = "updated"): Promise<ChatSummary[]> {
		const page = await this.backend.getChatList({ offset, limit, order });
		return page.items.map((item) => ({ conversationId: item.id, title: item.title ?? "" }));
	}

	async numOfChats(): Promise<number> {
		const page = await this.backend.getChatList({ offset: 0, limit: 1 });
		return page.total;
	}

	shareLinks(order = "created"): Promise<JsonObject> {
		return this.backend.getShareLinks(order);
	}

	sendDataToEmail(): Promise<JsonObject> {
		return this.backend.sendDataToEmail();
	}

	async editTitle(title: string, conversationId?: string): Promise<JsonObject> {
		return this.backend.editChatTitle(this._requireConversationId(conversationId, "edit the title"), title);
	}

	async generateTitle(messageId?: string, conversationId?: string): Promise<JsonObject> {
		const target = this._requireConversationId(conversationId, "generate a title");
		const message = messageId ?? this._currentAnswerId;
		if (message === null) {
			throw new EmptySessionError("generate a title");
		}
		return this.backend.generateChatTitle(target, message);
	}

	async deleteChat(conversationId?: string): Promise<JsonObject> {
		return this.backend.deleteChat(this._requireConversationId(conversationId, "delete the chat"));
	}

	// =========================================================================
	// Persistence
	// =========================================================================

	toSnapshot(): SessionSnapshot {
		return snapshotFromState(this._activeState());
	}

	/** Rebuild a session from a snapshot (validated before use) */
	static fromSnapshot(backend: BackendApi, snapshot: unknown, options: ChatSessionOptions = {}): ChatSession {
		const session = new ChatSession(backend, options);
		const state = stateFromSnapshot(parseSnapshot(snapshot));
		if (state) {
			session._applyState(state);
		}
		return session;
	}

	/**
	 * Write the snapshot to `path`, or `<sessionsDir>/<conversationId>.json`.
	 * Returns the absolute path written.
	 */
	save(path?: string): string {
		const target = path ?? getSessionFilePath(this.sessionsDir, this._requireConversationId(undefined, "save"));
		return saveSessionFile(target, this.toSnapshot());
	}

	static load(backend: BackendApi, path: string, options: ChatSessionOptions = {}): ChatSession {
		return ChatSession.fromSnapshot(backend, loadSessionFile(path), options);
	}

	toString(): string {
		return `<ChatSession: ${this._conversationId ?? "(none)"}>`;
	}

	// =========================================================================
	// Internals
	// =========================================================================

	private _activeState(): TreeState | null {
		if (
			this._treeId === null ||
			this._rootId === null ||
			this._currentQuestionId === null ||
			this._currentAnswerId === null
		) {
			return null;
		}
		return {
			store: this._store,
			conversationId: this._conversationId,
			treeId: this._treeId,
			rootId: this._rootId,
			currentQuestionId: this._currentQuestionId,
			currentAnswerId: this._currentAnswerId,
		};
	}

	private _applyState(state: TreeState): void {
		this._store = state.store;
		this._conversationId = state.conversationId;
		this._treeId = state.treeId;
		this._rootId = state.rootId;
		this._currentQuestionId = state.currentQuestionId;
		this._currentAnswerId = state.currentAnswerId;
	}

	private _requireConversationId(conversationId: string | undefined, operation: string): string {
		const id = conversationId ?? this._conversationId;
		if (id === null) {
			throw new EmptySessionError(operation);
		}
		return id;
	}

	private _assertCanBind(conversationId: string): void {
		if (this._conversationId !== null && this._conversationId !== conversationId) {
			throw new ConversationLockedError(this._conversationId, conversationId);
		}
	}

	private _enqueue<T>(operation: () => T | Promise<T>): Promise<T> {
		const run = this._queue.then(operation);
		this._queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}
}
