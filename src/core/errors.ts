/**
 * Error taxonomy for the conversation client.
 *
 * Every error carries a stable `code` so callers can branch on it without
 * string-matching messages:
 *
 * ```typescript
 * try {
 *   session.goback();
 * } catch (error) {
 *   if (error instanceof WebChatError && error.is("AT_ROOT")) {
 *     // already at the first message
 *   }
 * }
 * ```
 */

export type WebChatErrorCode =
	| "MALFORMED_NODE"
	| "DUPLICATE_NODE"
	| "UNKNOWN_NODE"
	| "CYCLE_DETECTED"
	| "INVALID_TARGET"
	| "AT_ROOT"
	| "MALFORMED_TREE"
	| "REMOTE_CALL"
	| "CONFIGURATION"
	| "CONVERSATION_LOCKED"
	| "EMPTY_SESSION"
	| "INVALID_MESSAGE"
	| "SESSION_FILE";

export class WebChatError extends Error {
	readonly code: WebChatErrorCode;

	constructor(code: WebChatErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "WebChatError";
		this.code = code;
	}

	is(code: WebChatErrorCode): boolean {
		return this.code === code;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
		};
	}
}

/** A raw node payload had no resolvable id or an unexpected shape */
export class MalformedNodeError extends WebChatError {
	constructor(message: string) {
		super("MALFORMED_NODE", message);
		this.name = "MalformedNodeError";
	}
}

export class DuplicateNodeError extends WebChatError {
	constructor(readonly nodeId: string) {
		super("DUPLICATE_NODE", `Node '${nodeId}' already exists.`);
		this.name = "DuplicateNodeError";
	}
}

export class UnknownNodeError extends WebChatError {
	constructor(readonly nodeId: string) {
		super("UNKNOWN_NODE", `Node '${nodeId}' does not exist.`);
		this.name = "UnknownNodeError";
	}
}

export class CycleDetectedError extends WebChatError {
	constructor(readonly nodeId: string) {
		super("CYCLE_DETECTED", `Cycle detected: node '${nodeId}' was visited twice.`);
		this.name = "CycleDetectedError";
	}
}

export class InvalidTargetError extends WebChatError {
	constructor(readonly nodeId: string, reason: string) {
		super("INVALID_TARGET", `Cannot move to node '${nodeId}': ${reason}.`);
		this.name = "InvalidTargetError";
	}
}

export class AtRootError extends WebChatError {
	constructor() {
		super("AT_ROOT", "Already at the root of the conversation.");
		this.name = "AtRootError";
	}
}

export class MalformedTreeError extends WebChatError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("MALFORMED_TREE", message, options);
		this.name = "MalformedTreeError";
	}
}

/**
 * Transport or parse failure talking to the backend.
 * `statusCode` is set when the failure came from an HTTP response.
 */
export class RemoteCallError extends WebChatError {
	readonly statusCode?: number;

	constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
		super("REMOTE_CALL", message, { cause: options?.cause });
		this.name = "RemoteCallError";
		this.statusCode = options?.statusCode;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), statusCode: this.statusCode };
	}
}

export class ConfigurationError extends WebChatError {
	constructor(message: string) {
		super("CONFIGURATION", message);
		this.name = "ConfigurationError";
	}
}

export class ConversationLockedError extends WebChatError {
	constructor(current: string, requested: string) {
		super(
			"CONVERSATION_LOCKED",
			`Session is bound to conversation '${current}' and cannot switch to '${requested}'. Open another session instead.`,
		);
		this.name = "ConversationLockedError";
	}
}

export class EmptySessionError extends WebChatError {
	constructor(operation: string) {
		super("EMPTY_SESSION", `Cannot ${operation}: no conversation has been started.`);
		this.name = "EmptySessionError";
	}
}

export class InvalidMessageError extends WebChatError {
	constructor(message: string) {
		super("INVALID_MESSAGE", message);
		this.name = "InvalidMessageError";
	}
}

export class SessionFileError extends WebChatError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("SESSION_FILE", message, options);
		this.name = "SessionFileError";
	}
}
