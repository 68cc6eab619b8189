/**
 * Public API exports for webchat-tree
 *
 * This file defines the public API surface for programmatic usage of the client.
 */

// Core SDK
export { createChatSession, type CreateChatSessionOptions, type CreateChatSessionResult } from "./core/sdk.js";

// Session
export {
	ChatSession,
	type AskOptions,
	type ChatLogEntry,
	type ChatLogRole,
	type ChatSessionOptions,
	type ChatSummary,
	type OpenSessionOptions,
} from "./core/chat-session.js";

// Tree model
export { ChatNode, normalizeNode, type NodeRecord, type RawNode, type ReadonlyChatNode } from "./core/chat-node.js";
export { TreeStore, type ReadonlyTreeStore } from "./core/tree-store.js";
export { reconcileConversation, type ReconcileOptions, type TreeState } from "./core/remote-sync.js";

// Backend
export {
	HttpBackend,
	type BackendApi,
	type ChatListQuery,
	type CompletionRequest,
	type CompletionResult,
	type HttpBackendOptions,
	type RemoteConversation,
} from "./core/backend.js";
export { resolveConnection, type Connection, type ConnectionOptions } from "./core/connection.js";

// Persistence
export {
	listSessionFiles,
	loadSessionFile,
	saveSessionFile,
	type SessionFileInfo,
	type SessionSnapshot,
} from "./core/session-files.js";
export { SettingsManager, DEFAULT_MODEL, type Settings } from "./core/settings-manager.js";

// Errors
export * from "./core/errors.js";
