/**
 * SDK for programmatic usage of ChatSession.
 *
 * Resolves the connection and session defaults the same way the CLI does,
 * or takes everything explicitly.
 *
 * @example
 * ```typescript
 * // Minimal - connection from env / ~/.webchat/settings.json
 * const { session } = await createChatSession();
 * console.log(await session.ask("hello"));
 *
 * // Resume a remote conversation on an explicit backend
 * const { session } = await createChatSession({
 *   backendUrl: "https://proxy.example/backend-api",
 *   accessToken: "test-secret",
 *   conversationId: "c-123",
 * });
 * ```
 */

import { getConfigDir, getSessionsDir } from "../config.js";
import { type BackendApi, HttpBackend } from "./backend.js";
import { ChatSession, type ChatSessionOptions } from "./chat-session.js";
import { type ConnectionOptions, resolveConnection } from "./connection.js";
import { SettingsManager } from "./settings-manager.js";

export interface CreateChatSessionOptions extends ConnectionOptions, ChatSessionOptions {
	/** Global config directory. Default: ~/.webchat */
	configDir?: string;
	/** Settings manager. Default: SettingsManager.create(configDir) */
	settingsManager?: SettingsManager;
	/** Backend to talk to. Default: HttpBackend from the resolved connection */
	backend?: BackendApi;
	/** Resume this remote conversation */
	conversationId?: string;
	/** Answer node to activate after resuming */
	currentAnswerId?: string;
	/** Load a saved snapshot instead of starting empty */
	sessionFile?: string;
}

export interface CreateChatSessionResult {
	session: ChatSession;
	settingsManager: SettingsManager;
}

/**
 * Create a ChatSession with the specified options.
 */
export async function createChatSession(options: CreateChatSessionOptions = {}): Promise<CreateChatSessionResult> {
	const configDir = options.configDir ?? getConfigDir();
	const settingsManager = options.settingsManager ?? SettingsManager.create(configDir);

	const backend = options.backend ?? new HttpBackend(resolveConnection(options, settingsManager.getSettings()));

	const sessionOptions: ChatSessionOptions = {
		model: options.model ?? settingsManager.getModel(),
		historyAndTrainingDisabled: options.historyAndTrainingDisabled ?? settingsManager.getHistoryAndTrainingDisabled(),
		chatListLimit: options.chatListLimit ?? settingsManager.getChatListLimit(),
		sessionsDir: options.sessionsDir ?? getSessionsDir(configDir),
	};

	let session: ChatSession;
	if (options.sessionFile) {
		session = ChatSession.load(backend, options.sessionFile, sessionOptions);
		if (options.conversationId) {
			await session.syncFromRemote(options.conversationId);
		}
		if (options.currentAnswerId) {
			session.goto(options.currentAnswerId);
		}
	} else if (options.conversationId) {
		session = await ChatSession.open(backend, options.conversationId, {
			...sessionOptions,
			currentAnswerId: options.currentAnswerId,
		});
	} else {
		session = new ChatSession(backend, sessionOptions);
	}

	return { session, settingsManager };
}
