/**
 * Backend API - the HTTP surface the conversation session talks to.
 *
 * `BackendApi` is the seam: sessions only depend on the interface, so tests
 * (or another transport) can stand in for `HttpBackend`.
 *
 * Every response is checked against a schema before it is handed back;
 * anything that fails on the wire or in parsing surfaces as RemoteCallError.
 */

import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { RawMessageSchema } from "./chat-node.js";
import { ConfigurationError, RemoteCallError } from "./errors.js";
import { lastTwoFrames } from "./event-stream.js";

// ============================================================================
// Response Schemas
// ============================================================================

export const JsonObjectSchema = Type.Record(Type.String(), Type.Unknown());

export const AccountStatusSchema = Type.Object({
	account_plan: JsonObjectSchema,
});

export const ModelListSchema = Type.Object({
	categories: Type.Array(Type.Object({ category: Type.String() })),
	models: Type.Optional(Type.Array(Type.Unknown())),
});

export const ChatListPageSchema = Type.Object({
	items: Type.Array(
		Type.Object({
			id: Type.String(),
			title: Type.Optional(Type.Union([Type.String(), Type.Null()])),
		}),
	),
	total: Type.Number(),
	limit: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
	offset: Type.Optional(Type.Number()),
});

export const RemoteConversationSchema = Type.Object({
	mapping: Type.Record(Type.String(), Type.Unknown()),
	current_node: Type.Optional(Type.Union([Type.String(), Type.Null()])),
	conversation_id: Type.Optional(Type.String()),
	title: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

const FrameMessageSchema = Type.Intersect([RawMessageSchema, Type.Object({ id: Type.String() })]);

/** Second-to-last stream frame: the root acknowledgement on a first turn */
export const AckFrameSchema = Type.Object({
	message: FrameMessageSchema,
});

/** Last stream frame: the final answer */
export const AnswerFrameSchema = Type.Object({
	message: FrameMessageSchema,
	conversation_id: Type.String(),
});

export type JsonObject = Static<typeof JsonObjectSchema>;
export type AccountStatus = Static<typeof AccountStatusSchema>;
export type ModelList = Static<typeof ModelListSchema>;
export type ChatListPage = Static<typeof ChatListPageSchema>;
export type RemoteConversation = Static<typeof RemoteConversationSchema>;
export type AckFrame = Static<typeof AckFrameSchema>;
export type AnswerFrame = Static<typeof AnswerFrameSchema>;

// ============================================================================
// Request Types
// ============================================================================

export interface ChatListQuery {
	offset?: number;
	limit?: number;
	order?: string;
}

export interface CompletionRequest {
	/** User text to send */
	prompt: string;
	/** Client-generated id of the question message */
	messageId: string;
	/** Node the question hangs off */
	parentMessageId: string;
	/** Omitted on the first turn */
	conversationId?: string;
	model: string;
	historyAndTrainingDisabled: boolean;
}

export interface CompletionResult {
	/** Null when the second-to-last frame is not a message frame */
	ack: AckFrame | null;
	answer: AnswerFrame;
}

export interface BackendApi {
	readonly backendUrl: string;
	readonly accessToken: string;

	getAccountStatus(): Promise<AccountStatus>;
	getModels(historyAndTrainingDisabled?: boolean): Promise<ModelList>;
	getBetaFeatures(): Promise<JsonObject>;
	getChatList(query?: ChatListQuery): Promise<ChatListPage>;
	getChatById(conversationId: string): Promise<RemoteConversation>;
	getShareLinks(order?: string): Promise<JsonObject>;
	sendDataToEmail(): Promise<JsonObject>;
	editChatTitle(conversationId: string, title: string): Promise<JsonObject>;
	generateChatTitle(conversationId: string, messageId: string): Promise<JsonObject>;
	deleteChat(conversationId: string): Promise<JsonObject>;
	chatCompletion(request: CompletionRequest): Promise<CompletionResult>;
}

// ============================================================================
// HttpBackend
// ============================================================================

export interface HttpBackendOptions {
	backendUrl: string;
	accessToken: string;
}

type HttpMethod = "GET" | "POST" | "PATCH";

interface RequestOptions {
	query?: Record<string, string | number | boolean | undefined>;
	body?: unknown;
}

function describeMismatch(schema: TSchema, value: unknown): string {
	const first = Value.Errors(schema, value).First();
	return first ? ` at '${first.path || "/"}': ${first.message}` : "";
}

export class HttpBackend implements BackendApi {
	readonly backendUrl: string;
	readonly accessToken: string;

	constructor(options: HttpBackendOptions) {
		if (!options.backendUrl) {
			throw new ConfigurationError("Backend URL is not set.");
		}
		if (!options.accessToken) {
			throw new ConfigurationError("Access token is not set.");
		}
		// Remove trailing slash for consistent URL building
		this.backendUrl = options.backendUrl.replace(/\/+$/, "");
		this.accessToken = options.accessToken;
	}

	// =========================================================================
	// Account
	// =========================================================================

	getAccountStatus(): Promise<AccountStatus> {
		return this.request("GET", "/accounts/check", AccountStatusSchema);
	}

	getModels(historyAndTrainingDisabled = false): Promise<ModelList> {
		return this.request("GET", "/models", ModelListSchema, {
			query: { history_and_training_disabled: historyAndTrainingDisabled },
		});
	}

	getBetaFeatures(): Promise<JsonObject> {
		return this.request("GET", "/settings/beta_features", JsonObjectSchema);
	}

	sendDataToEmail(): Promise<JsonObject> {
		return this.request("POST", "/accounts/data_export", JsonObjectSchema);
	}

	// =========================================================================
	// Conversations
	// =========================================================================

	getChatList(query: ChatListQuery = {}): Promise<ChatListPage> {
		return this.request("GET", "/conversations", ChatListPageSchema, {
			query: {
				offset: query.offset ?? 0,
				limit: query.limit,
				order: query.order ?? "updated",
			},
		});
	}

	getChatById(conversationId: string): Promise<RemoteConversation> {
		return this.request("GET", `/conversation/${encodeURIComponent(conversationId)}`, RemoteConversationSchema);
	}

	getShareLinks(order = "created"): Promise<JsonObject> {
		return this.request("GET", "/shared_conversations", JsonObjectSchema, { query: { order } });
	}

	editChatTitle(conversationId: string, title: string): Promise<JsonObject> {
		return this.request("PATCH", `/conversation/${encodeURIComponent(conversationId)}`, JsonObjectSchema, {
			body: { title },
		});
	}

	generateChatTitle(conversationId: string, messageId: string): Promise<JsonObject> {
		return this.request(
			"POST",
			`/conversation/gen_title/${encodeURIComponent(conversationId)}`,
			JsonObjectSchema,
			{ body: { message_id: messageId } },
		);
	}

	/** The backend hides conversations rather than deleting them */
	deleteChat(conversationId: string): Promise<JsonObject> {
		return this.request("PATCH", `/conversation/${encodeURIComponent(conversationId)}`, JsonObjectSchema, {
			body: { is_visible: false },
		});
	}

	async chatCompletion(request: CompletionRequest): Promise<CompletionResult> {
		const body = {
			action: "next",
			messages: [
				{
					id: request.messageId,
					author: { role: "user" },
					content: { content_type: "text", parts: [request.prompt] },
				},
			],
			conversation_id: request.conversationId,
			parent_message_id: request.parentMessageId,
			model: request.model,
			history_and_training_disabled: request.historyAndTrainingDisabled,
		};

		const text = await this.send("POST", "/conversation", { body }, "text/event-stream");
		const [ack, answer] = lastTwoFrames(text);

		if (!Value.Check(AnswerFrameSchema, answer)) {
			throw new RemoteCallError(
				`POST /conversation: unexpected answer frame${describeMismatch(AnswerFrameSchema, answer)}`,
			);
		}
		return {
			ack: Value.Check(AckFrameSchema, ack) ? ack : null,
			answer,
		};
	}

	// =========================================================================
	// Plumbing
	// =========================================================================

	private async request<T extends TSchema>(
		method: HttpMethod,
		path: string,
		schema: T,
		options: RequestOptions = {},
	): Promise<Static<T>> {
		const text = await this.send(method, path, options, "application/json");

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (error) {
			throw new RemoteCallError(`${method} ${path}: response is not valid JSON`, { cause: error });
		}

		if (!Value.Check(schema, json)) {
			throw new RemoteCallError(`${method} ${path}: unexpected response${describeMismatch(schema, json)}`);
		}
		return json;
	}

	private async send(method: HttpMethod, path: string, options: RequestOptions, accept: string): Promise<string> {
		const url = new URL(`${this.backendUrl}${path}`);
		for (const [key, value] of Object.entries(options.query ?? {})) {
			if (value !== undefined) {
				url.searchParams.set(key, String(value));
			}
		}

		let response: Response;
		let text: string;
		try {
			response = await fetch(url.toString(), {
				method,
				headers: {
					"Content-Type": "application/json",
					Authorization: `Bearer ${this.accessToken}`,
					Accept: accept,
				},
				body: options.body === undefined ? undefined : JSON.stringify(options.body),
			});
			text = await response.text();
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			throw new RemoteCallError(`${method} ${path} failed: ${reason}`, { cause: error });
		}

		if (!response.ok) {
			throw new RemoteCallError(`${method} ${path} failed: HTTP ${response.status}: ${text}`, {
				statusCode: response.status,
			});
		}
		return text;
	}
}
