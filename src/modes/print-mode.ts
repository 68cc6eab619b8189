/**
 * Print mode (single-shot): ask each message in order, print each answer, exit.
 *
 * Used for:
 * - `webchat "message"` - answers only
 * - `webchat --log -c <id>` - the active path of a conversation
 * - `webchat --list` - recent conversations
 */

import chalk from "chalk";
import type { ChatLogEntry, ChatSession, ChatSummary } from "../core/chat-session.js";

export interface PrintModeOptions {
	/** Messages to ask, in order */
	messages: string[];
	/** Print the chat log after asking */
	log?: boolean;
	/** Print recent conversations before anything else */
	list?: boolean;
}

const ROLE_LABELS: Record<ChatLogEntry["role"], string> = {
	root: "root",
	question: "you",
	answer: "assistant",
};

export function formatChatLog(entries: readonly ChatLogEntry[]): string {
	return entries
		.map((entry) => {
			const label = entry.role === "question" ? chalk.cyan(ROLE_LABELS[entry.role]) : chalk.dim(ROLE_LABELS[entry.role]);
			return `${label} ${chalk.dim(entry.id.slice(0, 8))}\n${entry.message}`;
		})
		.join("\n\n");
}

export function formatChatList(chats: readonly ChatSummary[]): string {
	if (chats.length === 0) return chalk.dim("No conversations found");
	return chats.map((chat) => `${chalk.dim(chat.conversationId)}  ${chat.title || "(untitled)"}`).join("\n");
}

/**
 * Run in print (single-shot) mode.
 */
export async function runPrintMode(session: ChatSession, options: PrintModeOptions): Promise<void> {
	const { messages, log = false, list = false } = options;

	if (list) {
		console.log(formatChatList(await session.chatList()));
	}

	for (const message of messages) {
		console.log(await session.ask(message));
	}

	if (log) {
		const entries = session.chatLog();
		console.log(entries.length > 0 ? formatChatLog(entries) : chalk.dim("Conversation is empty"));
	}

	// Ensure stdout is fully flushed before returning
	await new Promise<void>((resolve, reject) => {
		process.stdout.write("", (err) => {
			if (err) reject(err);
			else resolve();
		});
	});
}
